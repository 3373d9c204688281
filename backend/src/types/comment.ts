export interface ParkComment {
  id: string;
  park_id: string;
  user_id: string;
  content: string;
  created_at: string;
  is_reported: boolean;
}

export interface NewCommentRow {
  park_id: string;
  user_id: string;
  content: string;
}
