/**
 * Error taxonomy.
 *
 * - ConfigurationError: invalid settings or TLS material; fatal for startup or
 *   for the collection cycle that needed them.
 * - ResolutionError: the target list itself could not be built.
 * - ScrapeError: one target failed; reported through the accumulator.
 * - ParseError: the exposition body could not be parsed.
 */

export class ScrapelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends ScrapelineError {}

export class ResolutionError extends ScrapelineError {}

export class ParseError extends ScrapelineError {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.line = line;
  }
}

export class ScrapeError extends ScrapelineError {
  /** Target URL with credentials stripped */
  readonly target: string;

  constructor(target: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.target = target;
  }
}

/** Message of an unknown thrown value, following `cause` chains one level */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause;
    if (cause instanceof Error && !err.message.includes(cause.message)) {
      return `${err.message} (${cause.message})`;
    }
    return err.message;
  }
  return String(err);
}
