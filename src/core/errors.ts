export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransportError extends PipelineError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.url = url;
    this.status = status;
  }
}

export class FormatError extends PipelineError {
  readonly url?: string;

  constructor(message: string, url?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.url = url;
  }
}

/** Operator-facing configuration problem; the CLI exits with status 2. */
export class ConfigError extends PipelineError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
