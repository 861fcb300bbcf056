/**
 * Types for relationships.
 *
 * A relationship is directed: it belongs to one contact (`contact_id`) and
 * describes another person, who may or may not be a contact themselves
 * (`related_contact_id`).
 */

/** Summary of the referenced contact, when there is one. */
export interface RelatedContactSummary {
  id: string;
  firstname: string;
  lastname: string;
}

export interface RelationshipEntry {
  id: string;
  contact_id: string;
  /** Name of the other person as the owner refers to them */
  name: string;
  /** Kind of relationship, e.g. "sibling", "colleague" */
  type: string;
  related_contact_id: string | null;
  related_contact: RelatedContactSummary | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateRelationshipInput {
  name?: string;
  type: string;
  related_contact_id?: string | null;
}

export interface UpdateRelationshipInput {
  name?: string;
  type?: string;
  related_contact_id?: string | null;
}
