export type PacerErrorCode = 'CONFIGURATION' | 'DIVISION_BY_ZERO' | 'EXTERNAL_TOOL' | 'CLEANUP';

export class PacerError extends Error {
  public readonly code: PacerErrorCode;

  constructor(code: PacerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends PacerError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIGURATION', message, options);
  }
}

export class DivisionByZeroError extends PacerError {
  constructor(numerator: number) {
    super('DIVISION_BY_ZERO', `Cannot divide ${numerator} by zero`);
  }
}

export class ExternalToolError extends PacerError {
  public readonly tool: string;

  constructor(tool: string, message: string, options?: ErrorOptions) {
    super('EXTERNAL_TOOL', message, options);
    this.tool = tool;
  }
}

export class CleanupError extends PacerError {
  public readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super('CLEANUP', `Could not remove ${path}`, options);
    this.path = path;
  }
}

/**
 * Turns anything that was thrown into a single printable line.
 */
export function describeError(raw: unknown): string {
  // our own messages are already written for the user
  if (raw instanceof PacerError) return raw.message;

  if (raw instanceof Error) {
    return raw.name !== 'Error' ? `${raw.name}: ${raw.message}` : raw.message;
  }

  return String(raw ?? '');
}

export const isAbortError = (err: unknown): boolean =>
  err instanceof Error && err.name === 'AbortError';
