export { ConfigurationError } from "@gwsos/clients-core";

/**
 * A timestamp could not be converted to a date-time. Sites with malformed
 * dates (e.g. a month of "00") must be fetched with `parseDateTime: false`.
 */
export class DateTimeParseError extends Error {
  readonly value: string;

  constructor(value: string) {
    super(`Unable to parse date-time "${value}". Retry with parseDateTime: false to keep timestamps as text.`);
    this.name = "DateTimeParseError";
    this.value = value;
  }
}

/** The service answered with a document this client cannot read */
export class ServiceResponseError extends Error {
  readonly source: string;

  constructor(message: string, source: string) {
    super(`${message} (${source})`);
    this.name = "ServiceResponseError";
    this.source = source;
  }
}
