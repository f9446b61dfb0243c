/**
 * Safely parse a config value to a number. Returns fallback for empty,
 * invalid, or non-finite values.
 *
 * ConfigService hands back env values as strings even when read with
 * `get<number>()`, so numeric settings go through this helper.
 */
export const parseNumber = (
  value: string | number | undefined,
  fallback: number,
): number => {
  if (value === undefined || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }

  return parsed;
};
