import type { Contact } from '@contacts/database';

/** Contact columns that can be used as exact-match listing filters. */
export const FILTER_FIELDS = ['firstName', 'lastName', 'email'] as const;

export type FilterField = (typeof FILTER_FIELDS)[number];

/**
 * Optional exact-match filters for the contact listing.
 * A field that is absent is disabled.
 */
export type ContactFilters = Partial<Record<FilterField, string>>;

/** Raw filter values as they arrive from the query string. */
export type RawContactFilters = Partial<
  Record<FilterField, string | null | undefined>
>;

export interface Pagination {
  skip: number;
  limit: number;
}

/**
 * Drops disabled filters. `undefined`, `null` and the empty string all
 * mean "no filter"; they are never matched literally.
 */
export function normalizeContactFilters(
  raw: RawContactFilters,
): ContactFilters {
  const filters: ContactFilters = {};
  for (const field of FILTER_FIELDS) {
    const value = raw[field];
    if (typeof value === 'string' && value !== '') {
      filters[field] = value;
    }
  }
  return filters;
}

/** Active filter fields in fixed order: firstName, lastName, email. */
export function activeFilterFields(filters: ContactFilters): FilterField[] {
  return FILTER_FIELDS.filter((field) => filters[field] !== undefined);
}

/**
 * Union of several result lists with duplicate rows removed.
 *
 * Rows are identified by id. Output order is first appearance while
 * scanning the lists left to right.
 */
export function unionContacts(
  ...lists: ReadonlyArray<ReadonlyArray<Contact>>
): Contact[] {
  const seen = new Set<number>();
  const result: Contact[] = [];

  for (const list of lists) {
    for (const contact of list) {
      if (seen.has(contact.id)) continue;
      seen.add(contact.id);
      result.push(contact);
    }
  }

  return result;
}
