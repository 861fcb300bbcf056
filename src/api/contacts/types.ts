/**
 * Types for contacts and the contact-listing query.
 * Property names are snake_case to match the column names.
 */

import type { NoteEntry } from '../notes/types.ts';
import type { ActivityEntry } from '../activities/types.ts';
import type { RelationshipEntry } from '../relationships/types.ts';
import type { ReminderEntry } from '../reminders/types.ts';

/** Contact columns a client may select through `?fields=`. */
export const CONTACT_FIELDS = [
  'firstname',
  'lastname',
  'nickname',
  'gender',
  'email',
  'phone',
  'birthday',
  'address',
  'how_we_met',
  'food_preference',
  'work_information',
  'contact_information',
  'circles',
  'photo',
] as const;

export type ContactField = (typeof CONTACT_FIELDS)[number];

/** Related records a client may preload through `?includes=`. */
export const CONTACT_INCLUDES = ['notes', 'activities', 'relationships', 'reminders'] as const;

export type ContactInclude = (typeof CONTACT_INCLUDES)[number];

/**
 * A contact as stored.
 *
 * `birthday` is `YYYY-MM-DD` when the year is known and `--MM-DD` otherwise.
 */
export interface ContactEntry {
  id: string;
  firstname: string;
  lastname: string;
  nickname: string;
  gender: string;
  email: string;
  phone: string;
  birthday: string | null;
  address: string;
  how_we_met: string;
  food_preference: string;
  work_information: string;
  contact_information: string;
  circles: string[];
  /** Public path of the profile photo, e.g. `/static/photos/<file>` */
  photo: string | null;
  created_at: Date;
  updated_at: Date;
}

/** Preloaded relations keyed by include name. */
export interface ContactRelations {
  notes: NoteEntry[];
  activities: ActivityEntry[];
  relationships: RelationshipEntry[];
  reminders: ReminderEntry[];
}

export type ContactWithRelations = ContactEntry & ContactRelations;

/** A contact row restricted to the selected fields, plus any preloaded relations. */
export type ContactListItem = Pick<ContactEntry, 'id'> &
  Partial<Omit<ContactEntry, 'id'>> &
  Partial<ContactRelations>;

/** Fields accepted on create; everything but `firstname` is optional. */
export interface CreateContactInput {
  firstname: string;
  lastname?: string;
  nickname?: string;
  gender?: string;
  email?: string;
  phone?: string;
  birthday?: string | null;
  address?: string;
  how_we_met?: string;
  food_preference?: string;
  work_information?: string;
  contact_information?: string;
  circles?: string[];
}

/** Fields accepted on update; omitted fields keep their value. */
export type UpdateContactInput = Partial<CreateContactInput>;

/** Raw `GET /api/contacts` query string. */
export interface ContactListQuery {
  page?: string;
  limit?: string;
  fields?: string;
  includes?: string;
  search?: string;
  circle?: string;
}

/** Normalized listing options produced from {@link ContactListQuery}. */
export interface ContactListOptions {
  page: number;
  limit: number;
  offset: number;
  /** Always starts with `id`. */
  fields: Array<'id' | ContactField>;
  includes: ContactInclude[];
  search: string | null;
  circle: string | null;
}

export interface ContactListResult {
  contacts: ContactListItem[];
  total: number;
  page: number;
  limit: number;
}
