import { Contact } from '@contacts/database';
import {
  activeFilterFields,
  normalizeContactFilters,
  unionContacts,
} from '../contact-filters';

function contact(id: number): Contact {
  return Object.assign(new Contact(), {
    id,
    firstName: `First${id}`,
    lastName: `Last${id}`,
    email: `c${id}@example.com`,
    phone: '555-0100',
    dateOfBirth: '1990-01-01',
    userId: 1,
  });
}

describe('normalizeContactFilters', () => {
  it('keeps non-empty values', () => {
    expect(
      normalizeContactFilters({ firstName: 'Ann', email: 'ann@example.com' }),
    ).toEqual({ firstName: 'Ann', email: 'ann@example.com' });
  });

  it('treats undefined, null and empty string as disabled', () => {
    expect(
      normalizeContactFilters({ firstName: '', lastName: null, email: undefined }),
    ).toEqual({});
  });
});

describe('activeFilterFields', () => {
  it('returns fields in firstName, lastName, email order', () => {
    expect(
      activeFilterFields({ email: 'x@example.com', firstName: 'Ann' }),
    ).toEqual(['firstName', 'email']);
  });

  it('returns an empty list when nothing is set', () => {
    expect(activeFilterFields({})).toEqual([]);
  });
});

describe('unionContacts', () => {
  it('keeps first appearance order across lists', () => {
    const [a, b, c] = [contact(1), contact(2), contact(3)];

    const result = unionContacts([b], [a, c]);

    expect(result.map((row) => row.id)).toEqual([2, 1, 3]);
  });

  it('removes rows that appear in more than one list', () => {
    const [a, b, c] = [contact(1), contact(2), contact(3)];

    const result = unionContacts([a, b], [b, c], [a]);

    expect(result.map((row) => row.id)).toEqual([1, 2, 3]);
  });

  it('returns an empty list for empty input', () => {
    expect(unionContacts([], [])).toEqual([]);
  });
});
