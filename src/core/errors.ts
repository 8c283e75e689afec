export const LEDGER_ERROR_CODES = [
  "AlreadyRegistered",
  "NotACreator",
  "SubscriptionsNotEnabled",
  "TippingNotEnabled",
  "InvalidAmount",
  "AlreadyEngaged",
  "NotSubscribed",
  "NotFound",
  "FeeTooHigh",
  "PaymentFailed",
  "InvalidProfileData",
  "InvalidCall",
  "InvalidConfig",
] as const;
export type LedgerErrorCode = (typeof LEDGER_ERROR_CODES)[number];

/** Caller-visible rejection. A call that throws one leaves no trace in the store. */
export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string = code,
  ) {
    super(message);
    this.name = "LedgerError";
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

export function fail(code: LedgerErrorCode, message?: string): never {
  throw new LedgerError(code, message);
}
