function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * `YYYY-MM-DD` birth date in `birthYear` whose birthday falls
 * `birthdayInDays` days after `today`. A Feb 29 that does not exist in
 * `birthYear` becomes Mar 1.
 */
export function seedBirthDate(
  birthdayInDays: number,
  birthYear: number,
  today: Date = new Date(),
): string {
  const target = new Date(today.getFullYear(), today.getMonth(), today.getDate());
  target.setDate(target.getDate() + birthdayInDays);

  let month = target.getMonth() + 1;
  let day = target.getDate();
  if (month === 2 && day === 29 && !isLeapYear(birthYear)) {
    month = 3;
    day = 1;
  }

  return `${birthYear}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}
