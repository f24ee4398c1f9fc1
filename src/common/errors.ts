export type DerErrorKind = "TruncatedInput" | "InvalidEncoding" | "BufferFull";

export class DerError extends Error {
  public readonly kind: DerErrorKind;

  constructor(kind: DerErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DerError";
    this.kind = kind;
  }
}

/** Fewer bytes remain than the read requires. */
export class TruncatedInputError extends DerError {
  constructor(message = "Truncated DER input", options?: ErrorOptions) {
    super("TruncatedInput", message, options);
    this.name = "TruncatedInputError";
  }
}

/** Indefinite, non-minimal or oversized length encoding, or an unexpected tag. */
export class InvalidEncodingError extends DerError {
  constructor(message = "Invalid DER encoding", options?: ErrorOptions) {
    super("InvalidEncoding", message, options);
    this.name = "InvalidEncodingError";
  }
}

export class BufferFullError extends DerError {
  constructor(message = "Output buffer is full", options?: ErrorOptions) {
    super("BufferFull", message, options);
    this.name = "BufferFullError";
  }
}
