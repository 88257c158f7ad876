// Raised when environment configuration is missing or malformed
export class ConfigError extends Error {
  constructor(message: string, public readonly fields: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A non-2xx answer from the Kaiterra API. Redirects count as failures since
 * the client never follows them.
 */
export class KaiterraApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly responseBody: string
  ) {
    super(`Kaiterra API responded with status ${status}`);
    this.name = "KaiterraApiError";
  }
}

export class TimestampFormatError extends Error {
  constructor(public readonly value: string) {
    super(`Timestamp is not in YYYY-MM-DDTHH:MM:SSZ format: ${value}`);
    this.name = "TimestampFormatError";
  }
}

// The API answered 2xx but the body does not have the expected shape
export class ResponseFormatError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = "ResponseFormatError";
  }
}
