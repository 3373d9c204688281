export interface ParkTag {
  id: string;
  park_id: string;
  tag: string;
}

export interface NewTagRow {
  park_id: string;
  tag: string;
}
