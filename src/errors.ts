export interface ConfigValidationError {
  field: string;
  message: string;
}

export class BookingPageError extends Error {
  constructor(
    readonly facilityId: string,
    readonly url: string
  ) {
    super(`Could not open the booking page for ${facilityId} (${url}).`);
    this.name = 'BookingPageError';
  }
}

export class ConfigError extends Error {
  constructor(readonly errors: ConfigValidationError[]) {
    super(`Invalid configuration: ${errors.map((error) => error.field).join(', ')}`);
    this.name = 'ConfigError';
  }
}
