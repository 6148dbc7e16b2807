/**
 * Decode errors
 *
 * Every failure of a decode call surfaces as one HmpDecodeError. The `kind`
 * tells callers which check failed; `message` is meant for people.
 */

export type HmpErrorKind =
  | "OpenOrSizeError"
  | "UnrecognizedSubformat"
  | "UnsupportedRevision"
  | "InvalidHeader"
  | "TruncatedInput"
  | "UnreadableSkinChunk";

/** Error thrown when an HMP buffer cannot be decoded. */
export class HmpDecodeError extends Error {
  readonly kind: HmpErrorKind;
  /** Byte offset the decoder was at, when known */
  readonly offset: number | undefined;

  constructor(kind: HmpErrorKind, message: string, offset?: number) {
    super(offset === undefined ? message : `${message} (at byte ${offset})`);
    this.name = "HmpDecodeError";
    this.kind = kind;
    this.offset = offset;
  }
}

/** Narrow an unknown error to an HmpDecodeError, optionally of one kind. */
export function isHmpDecodeError(
  err: unknown,
  kind?: HmpErrorKind
): err is HmpDecodeError {
  if (!(err instanceof HmpDecodeError)) return false;
  return kind === undefined || err.kind === kind;
}
