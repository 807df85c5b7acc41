export type Asn1DecodeErrorCode =
  | "TruncatedInput"
  | "InvalidIdentifier"
  | "UnsupportedLength"
  | "PayloadTooLarge"
  | "InvalidEncoding"
  | "DepthExceeded"
  | "BudgetExceeded";

/**
 * Raised for any malformed or unsupported input met while decoding.
 * `offset` is the source position at which the problem was detected.
 */
export class Asn1DecodeError extends Error {
  public readonly code: Asn1DecodeErrorCode;
  public readonly offset: number;

  public constructor(code: Asn1DecodeErrorCode, message: string, offset: number) {
    super(`${message} (at offset ${offset})`);
    this.name = "Asn1DecodeError";
    this.code = code;
    this.offset = offset;
  }

  public static is(
    error: unknown,
    code?: Asn1DecodeErrorCode,
  ): error is Asn1DecodeError {
    return (
      error instanceof Asn1DecodeError &&
      (code === undefined || error.code === code)
    );
  }
}

/** Raised when a primitive payload cannot be rendered as its universal type. */
export class Asn1FormatError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "Asn1FormatError";
  }
}
