/**
 * Narrowing helpers for `pg` result rows, which arrive untyped.
 */

export function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}

export function toNullableDate(value: unknown): Date | null {
  return value === null || value === undefined ? null : toDate(value);
}

export function toText(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}

export function toNullableText(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

export function toStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.map((v) => String(v)) : [];
}
