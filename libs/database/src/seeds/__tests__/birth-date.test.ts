import { seedBirthDate } from '../birth-date';

describe('seedBirthDate', () => {
  it('offsets from today into the birth year', () => {
    expect(seedBirthDate(3, 1990, new Date(2024, 4, 5))).toBe('1990-05-08');
  });

  it('crosses month and year ends', () => {
    expect(seedBirthDate(4, 1985, new Date(2024, 11, 29))).toBe('1985-01-02');
  });

  it('moves Feb 29 to Mar 1 for a non-leap birth year', () => {
    expect(seedBirthDate(1, 2001, new Date(2024, 1, 28))).toBe('2001-03-01');
  });

  it('keeps Feb 29 for a leap birth year', () => {
    expect(seedBirthDate(1, 2000, new Date(2024, 1, 28))).toBe('2000-02-29');
  });
});
