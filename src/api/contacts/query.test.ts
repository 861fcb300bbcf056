import { describe, it, expect } from 'vitest';
import { buildContactListSql, escapeLike, parseContactListQuery } from './query.ts';
import { CONTACT_FIELDS } from './types.ts';

describe('parseContactListQuery', () => {
  it('applies defaults to an empty query', () => {
    const options = parseContactListQuery({});
    expect(options).toEqual({
      page: 1,
      limit: 25,
      offset: 0,
      fields: ['id', ...CONTACT_FIELDS],
      includes: [],
      search: null,
      circle: null,
    });
  });

  it('computes the offset from page and limit', () => {
    const options = parseContactListQuery({ page: '3', limit: '10' });
    expect(options.page).toBe(3);
    expect(options.limit).toBe(10);
    expect(options.offset).toBe(20);
  });

  it.each([
    ['0', 1],
    ['-4', 1],
    ['abc', 1],
    ['', 1],
  ])('falls back to page 1 for page=%s', (raw, expected) => {
    expect(parseContactListQuery({ page: raw }).page).toBe(expected);
  });

  it.each([
    ['0', 25],
    ['101', 25],
    ['nope', 25],
    ['100', 100],
    ['1', 1],
  ])('normalizes limit=%s to %i', (raw, expected) => {
    expect(parseContactListQuery({ limit: raw }).limit).toBe(expected);
  });

  it('keeps whitelisted fields, drops unknown ones and collapses duplicates', () => {
    const options = parseContactListQuery({ fields: 'firstname, email,password,firstname,,circles' });
    expect(options.fields).toEqual(['id', 'firstname', 'email', 'circles']);
  });

  it('selects only id when no requested field is valid', () => {
    expect(parseContactListQuery({ fields: 'password,secret' }).fields).toEqual(['id']);
  });

  it('keeps only known includes', () => {
    const options = parseContactListQuery({ includes: 'notes,emails,reminders,notes' });
    expect(options.includes).toEqual(['notes', 'reminders']);
  });

  it('trims search and circle and treats blanks as absent', () => {
    expect(parseContactListQuery({ search: '  ann ', circle: ' family ' })).toMatchObject({
      search: 'ann',
      circle: 'family',
    });
    expect(parseContactListQuery({ search: '   ', circle: '' })).toMatchObject({ search: null, circle: null });
  });
});

describe('escapeLike', () => {
  it('escapes LIKE wildcards and the escape character', () => {
    expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
  });

  it('leaves ordinary text alone', () => {
    expect(escapeLike("O'Brien")).toBe("O'Brien");
  });
});

describe('buildContactListSql', () => {
  it('builds an unfiltered page query', () => {
    const sql = buildContactListSql(parseContactListQuery({ fields: 'firstname,lastname', page: '2', limit: '10' }));

    expect(sql.text).toContain('SELECT id::text AS id, firstname, lastname');
    expect(sql.text).not.toContain('WHERE');
    expect(sql.text).toContain('ORDER BY lastname, firstname, id');
    expect(sql.text).toContain('LIMIT $1 OFFSET $2');
    expect(sql.values).toEqual([10, 10]);
    expect(sql.count_text).toBe('SELECT COUNT(*) AS total FROM contact ');
    expect(sql.count_values).toEqual([]);
  });

  it('binds the search term with wildcards escaped', () => {
    const sql = buildContactListSql(parseContactListQuery({ search: '100%' }));

    expect(sql.text).toContain('WHERE (firstname ILIKE $1 OR lastname ILIKE $1 OR nickname ILIKE $1)');
    expect(sql.text).toContain('LIMIT $2 OFFSET $3');
    expect(sql.values).toEqual(['%100\\%%', 25, 0]);
    expect(sql.count_values).toEqual(['%100\\%%']);
  });

  it('combines search and circle filters in both queries', () => {
    const sql = buildContactListSql(parseContactListQuery({ search: 'ann', circle: 'family' }));

    const where = 'WHERE (firstname ILIKE $1 OR lastname ILIKE $1 OR nickname ILIKE $1) AND circles @> jsonb_build_array($2::text)';
    expect(sql.text).toContain(where);
    expect(sql.count_text).toBe(`SELECT COUNT(*) AS total FROM contact ${where}`);
    expect(sql.values).toEqual(['%ann%', 'family', 25, 0]);
    expect(sql.count_values).toEqual(['%ann%', 'family']);
  });

  it('never interpolates client text into the statement', () => {
    const sql = buildContactListSql(parseContactListQuery({ search: "'; DROP TABLE contact; --", circle: "x') OR true --" }));
    expect(sql.text).not.toContain('DROP TABLE');
    expect(sql.count_text).not.toContain('OR true');
  });
});
