import type { LevelWithSilent } from "pino";
import type { AppConfig } from "../config";
import { acceptAllPayments, MemorySink } from "../infra/collaborators";
import { type ILogger, makeLogger } from "../logging";
import { isLedgerError, type LedgerErrorCode } from "./errors";
import { computeEventsRoot, computeStateRoot, hashCall } from "./hash";
import { executeCall } from "./reducer";
import { MemoryStore } from "./store";
import type {
  Address,
  ApplyResult,
  ContentId,
  EventSink,
  Hex,
  LedgerCall,
  LedgerConfig,
  LedgerEvent,
  PaymentPort,
  Timestamp,
} from "./types";
import { LedgerView } from "./view";

export interface SignedCall {
  caller: Address;
  call: LedgerCall;
}

interface ReceiptBase {
  caller: Address;
  callHash: Hex;
  stateRoot: Hex; // after the call
}

export type Receipt =
  | (ReceiptBase & {
      ok: true;
      events: LedgerEvent[];
      eventsRoot: Hex;
      contentId?: ContentId;
    })
  | (ReceiptBase & { ok: false; code: LedgerErrorCode; message: string });

export interface RuntimeOptions {
  config: LedgerConfig;
  now?: () => Timestamp;
  payments?: PaymentPort;
  sink?: EventSink;
  store?: MemoryStore;
  logger?: ILogger;
  logLevel?: LevelWithSilent;
  logPretty?: boolean;
}

const wallClock = (): Timestamp => BigInt(Math.floor(Date.now() / 1000));

/* ──────────── runtime shell ──────────── */
/**
 * Serializes calls onto one store. Each call commits fully or not at all;
 * events reach the sink only after a commit.
 */
export class LedgerRuntime {
  readonly view: LedgerView;
  private readonly store: MemoryStore;
  private readonly config: LedgerConfig;
  private readonly now: () => Timestamp;
  private readonly payments: PaymentPort;
  private readonly sink: EventSink;
  private readonly log: ILogger;

  constructor(opts: RuntimeOptions) {
    this.config = opts.config;
    this.now = opts.now ?? wallClock;
    this.payments = opts.payments ?? acceptAllPayments;
    this.sink = opts.sink ?? new MemorySink();
    this.store = opts.store ?? new MemoryStore();
    this.log =
      opts.logger ??
      makeLogger(opts.logLevel ?? "info", { pretty: opts.logPretty ?? false });
    this.view = new LedgerView(this.store, this.config, this.now);
  }

  /** Runtime for a loaded {@link AppConfig}; `rest` supplies collaborators. */
  static fromConfig(
    app: AppConfig,
    rest: Omit<RuntimeOptions, "config" | "logLevel" | "logPretty"> = {},
  ): LedgerRuntime {
    return new LedgerRuntime({
      ...rest,
      config: app.ledger,
      logLevel: app.logLevel,
      logPretty: app.logPretty,
    });
  }

  submit(caller: Address, call: LedgerCall): Receipt {
    const callHash = hashCall(caller, call);
    let result: ApplyResult;
    try {
      result = executeCall(this.store, call, {
        caller,
        now: this.now(),
        config: this.config,
        payments: this.payments,
      });
    } catch (err) {
      if (!isLedgerError(err)) throw err;
      this.log.info({ caller, call: call.type, code: err.code }, "call rejected");
      return {
        ok: false,
        caller,
        callHash,
        stateRoot: this.stateRoot(),
        code: err.code,
        message: err.message,
      };
    }

    for (const event of result.events) this.publish(event);
    this.log.debug(
      { caller, call: call.type, contentId: result.contentId?.toString() },
      "call applied",
    );
    return {
      ok: true,
      caller,
      callHash,
      stateRoot: this.stateRoot(),
      events: result.events,
      eventsRoot: computeEventsRoot(result.events),
      ...(result.contentId !== undefined ? { contentId: result.contentId } : {}),
    };
  }

  /** Applies calls in order. A rejected call does not stop the ones after it. */
  submitBatch(calls: readonly SignedCall[]): Receipt[] {
    return calls.map(({ caller, call }) => this.submit(caller, call));
  }

  stateRoot(): Hex {
    return computeStateRoot(this.store.snapshot());
  }

  private publish(event: LedgerEvent) {
    try {
      this.sink.emit(event);
    } catch (err) {
      // delivery is fire-and-forget; the commit already happened
      this.log.warn({ err, event: event.type }, "event sink failed");
    }
  }
}
