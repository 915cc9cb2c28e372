export class SDKError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class ConfigurationError extends SDKError {}

export class CliNotFoundError extends ConfigurationError {
  readonly searched: ReadonlyArray<string>;

  constructor(searched: ReadonlyArray<string>) {
    super(`claude cli not found (searched: ${searched.join(', ') || 'nothing'})`);
    this.searched = searched;
  }
}

export class ValidationError extends SDKError {}

export class EmptyPromptError extends ValidationError {
  constructor() {
    super('prompt is empty');
  }
}

export class UnsupportedContentError extends ValidationError {
  readonly kind: string;

  constructor(kind: string) {
    super(`unsupported content part: ${kind}`);
    this.kind = kind;
  }
}

export class AbortError extends SDKError {}

export class ProcessStartError extends SDKError {}

export class ProcessExitError extends SDKError {
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly stderr: string;

  constructor(exitCode: number | null, signal: string | null, stderr: string) {
    const status = exitCode !== null ? `exit status ${exitCode}` : `terminated by ${signal ?? 'unknown signal'}`;
    super(stderr ? `cli failed: ${status}: ${stderr}` : `cli failed: ${status}`);
    this.exitCode = exitCode;
    this.signal = signal;
    this.stderr = stderr;
  }
}

export class StreamError extends SDKError {}

export class StreamParseError extends StreamError {
  readonly line: string;

  constructor(message: string, line: string, cause?: Error) {
    super(message, cause);
    this.line = line;
  }
}

/** The CLI wrote a line without a `type`, which it does for fatal errors. */
export class CliReportedError extends StreamError {
  readonly payload: Readonly<Record<string, unknown>>;

  constructor(payload: Readonly<Record<string, unknown>>) {
    super(`cli error: ${JSON.stringify(payload)}`);
    this.payload = payload;
  }
}

export class StreamReadError extends StreamError {}
