// Error types for yamlite domain

export type YamlErrorCode =
  | "io_error"
  | "mutator_error"
  | "key_not_found"
  | "invalid_config"
  | "invalid_args";

/** Structured error with code, message, and optional file context */
export class YamlError extends Error {
  readonly code: YamlErrorCode;
  readonly file?: string;

  constructor(
    code: YamlErrorCode,
    message: string,
    file?: string,
  ) {
    super(message);
    this.name = "YamlError";
    this.code = code;
    this.file = file;
  }

  format(): string {
    return `error: ${this.code}\n${this.message}`;
  }

  toJSON(): { error: string; code: YamlErrorCode; message: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
    };
  }
}

/** Outcome of an operation that reports failure instead of throwing */
export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: YamlError };

/** Text of an unknown thrown value, as the runtime reported it */
export function reasonOf(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
