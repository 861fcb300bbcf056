/**
 * Types for activities: things done together with one or more contacts.
 */

export interface ActivityEntry {
  id: string;
  name: string;
  description: string;
  /** `YYYY-MM-DD` */
  date: string;
  contact_ids: string[];
  created_at: Date;
  updated_at: Date;
}

export interface CreateActivityInput {
  name: string;
  description?: string;
  date?: string;
  contact_ids: string[];
}

export interface UpdateActivityInput {
  name?: string;
  description?: string;
  date?: string;
  /** Replaces the participant list when given */
  contact_ids?: string[];
}

export interface ListActivitiesOptions {
  limit?: number;
  offset?: number;
}

export interface ListActivitiesResult {
  activities: ActivityEntry[];
  total: number;
}
