/**
 * Market error kinds. Every kind aborts the enclosing operation; the market reverts
 * its own state and the host checkpoint before the error reaches the caller.
 */
export type MarketErrorKind =
  | "InvalidConstruction"
  | "Unauthorized"
  | "TransferFailure"
  | "NonPositiveAmount"
  | "SlippageExceeded"
  | "ArithmeticOverflow"
  | "InvalidOutcomeIndex"
  | "MarketNotFound"
  | "ReentrantCall";

export class MarketError extends Error {
  readonly kind: MarketErrorKind;

  constructor(kind: MarketErrorKind, message: string) {
    super(`${kind}: ${message}`);
    this.name = "MarketError";
    this.kind = kind;
  }
}

export function isMarketError(err: unknown, kind?: MarketErrorKind): err is MarketError {
  return err instanceof MarketError && (kind === undefined || err.kind === kind);
}

/** Throws TransferFailure unless an asset ledger call reported success. */
export function requireTransfer(ok: boolean, what: string): void {
  if (!ok) throw new MarketError("TransferFailure", what);
}
