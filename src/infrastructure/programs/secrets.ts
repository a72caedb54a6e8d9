/**
 * Generated passwords that the SRE program expects in its stack config.
 * `dsh sre deploy` adds these as Pulumi secrets before running `up`.
 */

export const SRE_SECRET_NAMES = [
  'password-secure-research-desktop-admin',
  'password-user-database-admin',
] as const;

export const GENERATED_PASSWORD_LENGTH = 20;
