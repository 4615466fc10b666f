export class HarvestError extends Error {
  constructor(
    message: string,
    public service: string
  ) {
    super(message);
    this.name = 'HarvestError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when the analyzer has no CSV to read.
 */
export class NoInputError extends HarvestError {
  constructor(public directories: string[]) {
    super(`No .csv file found for analysis in ${directories.join(', ')}`, 'analyze');
    this.name = 'NoInputError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * One-line log message for a failed run, tagged with the service that raised
 * it, or `fallbackService` for errors from outside the project.
 */
export function describeFailure(error: unknown, fallbackService: string): string {
  const service = error instanceof HarvestError ? error.service : fallbackService;
  return `[${service}] ${describeError(error)}`;
}
