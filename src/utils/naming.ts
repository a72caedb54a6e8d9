/**
 * Naming Helpers
 *
 * String transformations used to turn user-facing names into Azure
 * resource names, which have tight length and character limits.
 */

import { createHash, randomInt } from 'crypto';

const PASSWORD_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Strip everything except ASCII letters and digits
 */
export function alphanumeric(input: string): string {
  return input.replace(/[^a-zA-Z0-9]/g, '');
}

/**
 * Replace runs of spaces, hyphens and underscores with a separator
 */
export function replaceSeparators(input: string, separator = ''): string {
  return input.replace(/[ _-]+/g, separator);
}

/**
 * Shorten a list of tokens until their combined length fits, always
 * trimming the first of the longest tokens.
 */
export function truncateTokens(tokens: string[], maxLength: number): string[] {
  const output = [...tokens];
  const total = (): number => output.reduce((sum, token) => sum + token.length, 0);
  while (total() > maxLength) {
    const longest = Math.max(...output.map((token) => token.length));
    const index = output.findIndex((token) => token.length === longest);
    output[index] = output[index]?.slice(0, -1) ?? '';
  }
  return output;
}

/**
 * Canonical form of an SRE name, used in file names, stack names and groups
 */
export function sanitiseSreName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function sha256hash(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}

export function b64encode(input: string): string {
  return Buffer.from(input, 'utf8').toString('base64');
}

export function b64decode(input: string): string {
  return Buffer.from(input, 'base64').toString('utf8');
}

/**
 * Random alphanumeric password with at least one lowercase letter,
 * one uppercase letter and one digit
 */
export function password(length: number): string {
  if (length < 3) {
    throw new Error('Passwords must be at least 3 characters long.');
  }
  for (;;) {
    let candidate = '';
    for (let i = 0; i < length; i++) {
      candidate += PASSWORD_ALPHABET.charAt(randomInt(PASSWORD_ALPHABET.length));
    }
    if (/[a-z]/.test(candidate) && /[A-Z]/.test(candidate) && /[0-9]/.test(candidate)) {
      return candidate;
    }
  }
}

export const SHM_PROJECT_NAME = 'shm';

export function sreProjectName(sreName: string): string {
  return `sre-${sanitiseSreName(sreName)}`;
}

export function shmStackName(shmName: string): string {
  return `shm-${shmName}`;
}

export function sreStackName(shmName: string, sreName: string): string {
  return `shm-${shmName}-sre-${sanitiseSreName(sreName)}`;
}
