export interface ParkPhoto {
  id: string;
  park_id: string;
  url: string;
  uploaded_by: string;
  created_at: string;
  is_approved: boolean;
}

export interface NewPhotoRow {
  park_id: string;
  url: string;
  uploaded_by: string;
}
