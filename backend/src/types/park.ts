export type ParkStatus = 'pending' | 'approved' | 'rejected';

export const PARK_STATUSES: readonly ParkStatus[] = ['pending', 'approved', 'rejected'];

export interface Park {
  id: string;
  name: string;
  description: string | null;
  latitude: number;
  longitude: number;
  address: string | null;
  status: ParkStatus;
  created_at: string;
  created_by: string;
  upvotes: number;
  downvotes: number;
}

export interface VoteTally {
  upvotes: number;
  downvotes: number;
}

export interface CreateParkInput {
  name: string;
  description?: string | null;
  latitude: number;
  longitude: number;
  address?: string | null;
}

export interface NewParkRow extends Required<CreateParkInput> {
  created_by: string;
}

export interface ParkFilter {
  status?: ParkStatus;
}
