// FetchError, FileError, ConfigError and SmtpSessionError abort a run with a
// non-zero exit code. ParseError and SendError are logged against the item
// that caused them and the run carries on.

export class ToolkitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure or non-HTML / non-2xx response while fetching a page. */
export class FetchError extends ToolkitError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

/** A single embedded fragment or template that could not be used. */
export class ParseError extends ToolkitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class TemplateError extends ParseError {
  readonly placeholder: string;

  constructor(placeholder: string) {
    super(`Unknown template placeholder {${placeholder}}`);
    this.placeholder = placeholder;
  }
}

/** Missing or unreadable CSV or attachment. */
export class FileError extends ToolkitError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

export class ConfigError extends ToolkitError {
  constructor(message: string) {
    super(message);
  }
}

/** Connection or authentication failure when the SMTP session starts. */
export class SmtpSessionError extends ToolkitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Delivery to one recipient failed. */
export class SendError extends ToolkitError {
  readonly recipient: string;

  constructor(recipient: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.recipient = recipient;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
