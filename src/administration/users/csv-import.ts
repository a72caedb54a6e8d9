/**
 * Read research users from a CSV file with the columns
 * GivenName, Surname, Phone, Email and CountryCode.
 */

import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';

import { DataSafeHavenUserHandlingError, errorMessage } from '../../utils/errors.js';
import { emailAddress } from '../../utils/validators.js';
import { ResearchUser } from './research-user.js';

export const REQUIRED_COLUMNS = ['GivenName', 'Surname', 'Phone', 'Email', 'CountryCode'] as const;

const PHONE_PATTERN = /^\+[1-9][0-9]{6,14}$/;

const nonEmpty = z.string().trim().min(1, 'must not be empty');

const CsvRowSchema = z.object({
  GivenName: nonEmpty,
  Surname: nonEmpty,
  Phone: z
    .string()
    .transform((value) => value.replace(/[\s()-]/g, ''))
    .refine((value) => PHONE_PATTERN.test(value), 'must be an international number, for example +447700900123'),
  Email: z
    .string()
    .trim()
    .refine((value) => {
      try {
        emailAddress(value);
        return true;
      } catch {
        return false;
      }
    }, 'must be a valid email address'),
  CountryCode: z
    .string()
    .trim()
    .transform((value) => value.toUpperCase())
    .refine((value) => /^[A-Z]{2}$/.test(value), 'must be a two-letter country code'),
});

const RecordsSchema = z.array(z.record(z.string()));

/**
 * given.surname in lowercase ASCII, e.g. "Zoë", "O'Brien" -> zoe.obrien
 */
export function usernameFor(givenName: string, surname: string): string {
  return `${givenName}.${surname}`
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9.]/g, '');
}

export function parseResearchUsersCsv(text: string, source = 'CSV input'): ResearchUser[] {
  let records: Array<Record<string, string>>;
  try {
    records = RecordsSchema.parse(parse(text, { columns: true, skip_empty_lines: true, bom: true }));
  } catch (e) {
    throw new DataSafeHavenUserHandlingError(`Could not parse ${source}.\n${errorMessage(e)}`, { cause: e });
  }

  const first = records[0];
  if (first) {
    const missing = REQUIRED_COLUMNS.filter((column) => !(column in first));
    if (missing.length) {
      throw new DataSafeHavenUserHandlingError(
        `Missing required CSV columns ${missing.map((column) => `'${column}'`).join(', ')} in ${source}.`
      );
    }
  }

  return records.map((record, index) => {
    const result = CsvRowSchema.safeParse(record);
    if (!result.success) {
      const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('\n');
      // Row 1 is the header
      throw new DataSafeHavenUserHandlingError(`Invalid user on row ${index + 2} of ${source}.\n${details}`);
    }
    const row = result.data;
    return new ResearchUser({
      givenName: row.GivenName,
      surname: row.Surname,
      username: usernameFor(row.GivenName, row.Surname),
      emailAddress: row.Email,
      phoneNumber: row.Phone,
      countryCode: row.CountryCode,
    });
  });
}

export function readResearchUsersCsv(csvPath: string): ResearchUser[] {
  if (!fs.existsSync(csvPath)) {
    throw new DataSafeHavenUserHandlingError(`Could not find file ${csvPath}.`);
  }
  return parseResearchUsersCsv(fs.readFileSync(csvPath, 'utf8'), `'${csvPath}'`);
}
