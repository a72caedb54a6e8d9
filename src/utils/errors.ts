/**
 * Errors
 *
 * Every failure the CLI reports to the user is a DataSafeHavenError.
 * Subclasses say which layer failed; the message says what.
 */

export class DataSafeHavenError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Local or remote configuration is missing or unreadable */
export class DataSafeHavenConfigError extends DataSafeHavenError {}

/** A value failed validation */
export class DataSafeHavenParameterError extends DataSafeHavenError {}

/** User input could not be used */
export class DataSafeHavenInputError extends DataSafeHavenError {}

export class DataSafeHavenValueError extends DataSafeHavenError {}

export class DataSafeHavenIPRangeError extends DataSafeHavenError {}

export class DataSafeHavenAzureError extends DataSafeHavenError {}

export class DataSafeHavenMicrosoftGraphError extends DataSafeHavenError {}

export class DataSafeHavenPulumiError extends DataSafeHavenError {}

export class DataSafeHavenUserHandlingError extends DataSafeHavenError {}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
