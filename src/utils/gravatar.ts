import crypto from 'crypto';

const GRAVATAR_BASE_URL = 'https://www.gravatar.com/avatar';

/**
 * Gravatar image URL for an email address. Unknown addresses get the
 * generated "identicon" image, so the URL is always usable.
 */
export const gravatarUrl = (email: string, size: number = 250): string => {
  const hash = crypto.createHash('md5').update(email.trim().toLowerCase()).digest('hex');
  return `${GRAVATAR_BASE_URL}/${hash}?s=${size}&d=identicon`;
};
