/**
 * Note types. A note is a dated free-text entry attached to one contact.
 */

export interface NoteEntry {
  id: string;
  contact_id: string;
  content: string;
  /** `YYYY-MM-DD` */
  date: string;
  created_at: Date;
  updated_at: Date;
}

export interface CreateNoteInput {
  content: string;
  /** Defaults to today (UTC) */
  date?: string;
}

export interface UpdateNoteInput {
  content?: string;
  date?: string;
}
