import { createHash } from 'crypto';

const GRAVATAR_BASE_URL = 'https://www.gravatar.com/avatar';

/**
 * Gravatar image URL for an email address (MD5 of the trimmed, lower-cased
 * address). Gravatar serves a generated identicon when no image exists.
 */
export function gravatarUrl(email: string): string {
  const hash = createHash('md5')
    .update(email.trim().toLowerCase())
    .digest('hex');
  return `${GRAVATAR_BASE_URL}/${hash}?d=identicon`;
}
