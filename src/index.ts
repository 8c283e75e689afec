// Errors
export {
  fail,
  isLedgerError,
  LEDGER_ERROR_CODES,
  LedgerError,
  type LedgerErrorCode,
} from "./core/errors";

// Model
export type {
  Address,
  ApplyResult,
  CallContext,
  CallType,
  Content,
  ContentId,
  CreatorStats,
  EventSink,
  Hex,
  LedgerCall,
  LedgerConfig,
  LedgerEvent,
  PaymentPort,
  Subscription,
  Timestamp,
} from "./core/types";

// Store
export {
  MemoryStore,
  StagedStore,
  type LedgerSnapshot,
  type LedgerStore,
} from "./core/store";

// Rules
export {
  applyCall,
  executeCall,
  MAX_PROFILE_BYTES,
  platformFeeOf,
  SUBSCRIPTION_PERIOD,
} from "./core/reducer";
export { isSubscribedAt, LedgerView, ZERO_STATS } from "./core/view";

// Hashing
export {
  computeEventsRoot,
  computeStateRoot,
  hashCall,
  merkle,
} from "./core/hash";

// Runtime
export {
  LedgerRuntime,
  type Receipt,
  type RuntimeOptions,
  type SignedCall,
} from "./core/runtime";
export {
  acceptAllPayments,
  MemorySink,
  RecordingPayments,
  type TransferRecord,
} from "./infra/collaborators";

// Boundary
export {
  createLedgerConfig,
  loadConfig,
  MAX_PLATFORM_FEE_BPS,
  type AppConfig,
} from "./config";
export { loggerOptions, makeLogger, type ILogger, type LogSettings } from "./logging";
export { decodeCall, parseAddress } from "./model/validation";
