export type ReadStreamErrorCode =
  | "delimiters_not_found"
  | "read_size_limit_reached"
  | "no_more_data"
  | "invalid_input"
  | "invalid_option"
  | "invalid_source_result"
  | "reentrant_call";

// ReadStreamError is thrown by the buffered read stream for every failure it detects itself.
// Errors thrown by the byte source are never wrapped.
export class ReadStreamError extends Error {
  readonly code: ReadStreamErrorCode;
  override readonly cause?: unknown;

  constructor(args: Readonly<{ code: ReadStreamErrorCode; message?: string; cause?: unknown }>) {
    const message = args.message != null && args.message !== "" ? `${args.code}: ${args.message}` : args.code;
    super(message, args.cause !== undefined ? { cause: args.cause } : undefined);
    this.name = "ReadStreamError";
    this.code = args.code;
    if (args.cause !== undefined) this.cause = args.cause;
  }
}

export function isReadStreamError(e: unknown, code?: ReadStreamErrorCode): e is ReadStreamError {
  return e instanceof ReadStreamError && (code === undefined || e.code === code);
}
