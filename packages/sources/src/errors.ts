/**
 * Thrown by the source factory when no adapter recognizes a location.
 * This is a configuration problem: it surfaces before any fetch happens.
 */
export class UnsupportedSourceError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Unsupported source URL: ${url}`);
    this.name = 'UnsupportedSourceError';
    this.url = url;
  }
}

/**
 * Thrown when a page responds with a non-2xx status. Fails that investor's
 * contribution to the current run only.
 */
export class PageFetchError extends Error {
  readonly url: string;
  readonly statusCode: number;

  constructor(url: string, statusCode: number) {
    super(`GET ${url} responded with HTTP ${statusCode}`);
    this.name = 'PageFetchError';
    this.url = url;
    this.statusCode = statusCode;
  }
}

/** A non-empty date cell that no supported layout matches. */
export class DateParseError extends Error {
  readonly input: string;

  constructor(input: string) {
    super(`Unable to parse date: ${input}`);
    this.name = 'DateParseError';
    this.input = input;
  }
}
