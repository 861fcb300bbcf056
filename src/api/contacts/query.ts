/**
 * Contact-listing query builder.
 *
 * Turns the `GET /api/contacts` query string into normalized options and the
 * options into parameterized SQL. Field and include names are whitelisted, so
 * the only client text that reaches SQL does so as bound parameters.
 */

import {
  CONTACT_FIELDS,
  CONTACT_INCLUDES,
  type ContactField,
  type ContactInclude,
  type ContactListOptions,
  type ContactListQuery,
} from './types.ts';

export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 25;
export const MAX_LIMIT = 100;

function isContactField(value: string): value is ContactField {
  return (CONTACT_FIELDS as readonly string[]).includes(value);
}

function isContactInclude(value: string): value is ContactInclude {
  return (CONTACT_INCLUDES as readonly string[]).includes(value);
}

/** Split a comma-separated list, trimming entries and dropping blanks and duplicates. */
function splitList(raw: string | undefined): string[] {
  if (!raw) return [];
  const seen = new Set<string>();
  for (const part of raw.split(',')) {
    const trimmed = part.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

function parsePage(raw: string | undefined): number {
  const page = parseInt(raw ?? '', 10);
  return Number.isFinite(page) && page >= 1 ? page : DEFAULT_PAGE;
}

function parseLimit(raw: string | undefined): number {
  const limit = parseInt(raw ?? '', 10);
  return Number.isFinite(limit) && limit >= 1 && limit <= MAX_LIMIT ? limit : DEFAULT_LIMIT;
}

/**
 * Normalize the raw query string.
 *
 * Out-of-range paging falls back to the defaults rather than failing, and
 * unknown field or include names are dropped.
 */
export function parseContactListQuery(query: ContactListQuery): ContactListOptions {
  const page = parsePage(query.page);
  const limit = parseLimit(query.limit);

  const requestedFields = splitList(query.fields);
  const fields: ContactListOptions['fields'] =
    requestedFields.length === 0 ? ['id', ...CONTACT_FIELDS] : ['id', ...requestedFields.filter(isContactField)];

  const search = query.search?.trim() || null;
  const circle = query.circle?.trim() || null;

  return {
    page,
    limit,
    offset: (page - 1) * limit,
    fields,
    includes: splitList(query.includes).filter(isContactInclude),
    search,
    circle,
  };
}

/** Escape LIKE wildcards so the search term matches literally. */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, '\\$&');
}

export interface ContactListSql {
  text: string;
  values: unknown[];
  count_text: string;
  count_values: unknown[];
}

function selectColumn(field: 'id' | ContactField): string {
  return field === 'id' ? 'id::text AS id' : field;
}

/** Build the page query and the matching count query for the given options. */
export function buildContactListSql(options: ContactListOptions): ContactListSql {
  const conditions: string[] = [];
  const values: unknown[] = [];
  let paramIndex = 1;

  if (options.search) {
    conditions.push(
      `(firstname ILIKE $${paramIndex} OR lastname ILIKE $${paramIndex} OR nickname ILIKE $${paramIndex})`,
    );
    values.push(`%${escapeLike(options.search)}%`);
    paramIndex++;
  }

  if (options.circle) {
    conditions.push(`circles @> jsonb_build_array($${paramIndex}::text)`);
    values.push(options.circle);
    paramIndex++;
  }

  const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

  return {
    text: `SELECT ${options.fields.map(selectColumn).join(', ')}
       FROM contact
       ${whereClause}
       ORDER BY lastname, firstname, id
       LIMIT $${paramIndex} OFFSET $${paramIndex + 1}`,
    values: [...values, options.limit, options.offset],
    count_text: `SELECT COUNT(*) AS total FROM contact ${whereClause}`,
    count_values: values,
  };
}
