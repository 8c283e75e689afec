import type { Address, EventSink, LedgerEvent, PaymentPort } from "../core/types";

/** Every transfer succeeds and nothing moves. Stand-in until a token adapter is wired. */
export const acceptAllPayments: PaymentPort = {
  transfer: () => true,
};

export interface TransferRecord {
  from: Address;
  to: Address;
  amount: bigint;
}

/** Records transfers; `reject` decides which ones fail. */
export class RecordingPayments implements PaymentPort {
  readonly transfers: TransferRecord[] = [];

  constructor(private readonly reject: (t: TransferRecord) => boolean = () => false) {}

  transfer(from: Address, to: Address, amount: bigint): boolean {
    const t = { from, to, amount };
    if (this.reject(t)) return false;
    this.transfers.push(t);
    return true;
  }
}

/** Append-only in-process event log. */
export class MemorySink implements EventSink {
  private readonly log: LedgerEvent[] = [];

  emit(event: LedgerEvent) {
    this.log.push(event);
  }

  get events(): readonly LedgerEvent[] {
    return this.log;
  }
}
