/** Error codes for import/export calls. */
export type TransferErrorCode = "CODEC_ERROR" | "IO_ERROR" | "UNSUPPORTED_FORMAT";

/** Aborts a whole import/export call. */
export class TransferError extends Error {
  constructor(
    public readonly code: TransferErrorCode,
    message: string,
    public readonly details: readonly string[] = [],
  ) {
    super(message);
    this.name = "TransferError";
  }
}

/** Malformed top-level input: unparsable JSON, missing sections, wrong CSV bundle shape. */
export class CodecError extends TransferError {
  constructor(message: string, details: readonly string[] = []) {
    super("CODEC_ERROR", message, details);
    this.name = "CodecError";
  }
}

/** Filesystem failure while reading a source or writing a destination. */
export class TransferIOError extends TransferError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super("IO_ERROR", message, [path]);
    this.name = "TransferIOError";
  }
}

/**
 * A single record failed. Caught at the record boundary by the reconciliation
 * engine and reported as a `failed` outcome; never aborts a batch.
 */
export class RecordError extends Error {
  constructor(
    public readonly recordName: string,
    message: string,
    public readonly origin?: Error,
  ) {
    super(message);
    this.name = "RecordError";
  }
}
