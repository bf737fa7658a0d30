// CHANGE: Typed errors for each failure class in the download pipeline.
// WHY: Retry classification and CLI exit handling branch on the error class, not on message text.

/**
 * Error hierarchy for the download pipeline.
 *
 * The CLI catches `ExtensionFetchError` subclasses and prints their message;
 * anything else is treated as a bug and printed the same way with exit code 1.
 */

export class ExtensionFetchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bad identifier syntax, missing batch file, conflicting flags.
 */
export class InputError extends ExtensionFetchError {}

/**
 * No HTTP response was received: connection refused or reset, DNS failure, timeout.
 */
export class TransportError extends ExtensionFetchError {
  readonly url: string;

  constructor(url: string, message: string, options?: ErrorOptions) {
    super(`${message} (${url})`, options);
    this.url = url;
  }
}

export class HttpStatusError extends ExtensionFetchError {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string) {
    super(`HTTP ${status} for ${url}`);
    this.status = status;
    this.url = url;
  }
}

export class RateLimitedError extends HttpStatusError {
  constructor(url: string) {
    super(429, url);
  }
}

export class NotFoundError extends ExtensionFetchError {}

export class MalformedResponseError extends ExtensionFetchError {}

export class VersionNotFoundError extends ExtensionFetchError {
  constructor(identifier: string, version: string) {
    super(`Version ${version} not found for addon ${identifier}.`);
  }
}

/**
 * CRX payload whose header cannot be parsed.
 */
export class PackageFormatError extends ExtensionFetchError {}

export class OutputExistsError extends ExtensionFetchError {
  readonly path: string;

  constructor(path: string) {
    super(`Output file ${path} already exists. Use --force to overwrite.`);
    this.path = path;
  }
}

export class RetryExhaustedError extends ExtensionFetchError {
  readonly attempts: number;

  constructor(label: string, attempts: number, cause: unknown) {
    super(`${label} failed after ${attempts} attempts: ${describeError(cause)}`, { cause });
    this.attempts = attempts;
  }
}

/**
 * Raised by the batch driver when an identifier fails without continue-on-error.
 */
export class BatchAbortedError extends ExtensionFetchError {
  readonly identifier: string;

  constructor(identifier: string, cause: unknown) {
    super(`Failed for ${identifier}: ${describeError(cause)}`, { cause });
    this.identifier = identifier;
  }
}

/**
 * Render any thrown value as a one-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
