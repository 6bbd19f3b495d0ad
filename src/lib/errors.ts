/**
 * Base class for every error raised by the reindex run.
 */
export class ReindexError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid settings, credential file or site URL. Fatal. */
export class ConfigurationError extends ReindexError {}

export interface UpstreamErrorOptions extends ErrorOptions {
  /** HTTP status, when a response was received. */
  status?: number;
  /** Parsed JSON body of the failed response, when it had one. */
  body?: unknown;
}

/**
 * A call to one of the remote APIs failed at the transport or HTTP level,
 * or returned something that could not be read.
 */
export class UpstreamError extends ReindexError {
  readonly status?: number;
  readonly body?: unknown;

  constructor(message: string, options: UpstreamErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.body = options.body;
  }
}

/** The account or host identity could not be resolved. Fatal. */
export class ResolutionError extends UpstreamError {}

/** The input table is missing or unusable. Fatal. */
export class InputError extends ReindexError {}

/** The results table could not be written. */
export class OutputError extends ReindexError {}

/**
 * Turns a caught value into the text recorded in a results row: the error
 * body returned by the API when there was one, the message otherwise.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof UpstreamError && error.body !== undefined) {
    return JSON.stringify(error.body);
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
