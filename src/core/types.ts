export type Big = bigint;
export type Address = `0x${string}`;
export type Hex = `0x${string}`;
export type ContentId = Big;
export type Timestamp = Big; // unix seconds, supplied by the runtime clock

/* ── tables ──────────────────────────────────────────────── */
export interface CreatorStats {
  readonly totalSubscribers: Big;
  readonly totalContent: Big;
  readonly totalTipsReceived: Big;
  readonly subscriptionFee: Big; // 0 = subscriptions disabled
  readonly engagementScore: Big; // reserved, never written after registration
}

export interface Content {
  readonly creator: Address;
  readonly contentHash: string;
  readonly timestamp: Timestamp;
  readonly isPremium: boolean;
  readonly tipEnabled: boolean;
  readonly totalTips: Big;
  readonly totalEngagements: Big;
}

export interface Subscription {
  readonly active: boolean;
  readonly expiry: Timestamp;
}

/* ── initialization parameters ───────────────────────────── */
export interface LedgerConfig {
  readonly paymentToken: Address;
  readonly platformFeeBps: number; // 0..1000
  readonly treasury?: Address;
}

/* ── calls (one per external request) ────────────────────── */
export type LedgerCall =
  | { type: "register"; profileData: string }
  | { type: "setSubscriptionFee"; fee: Big }
  | {
      type: "postContent";
      contentHash: string;
      isPremium: boolean;
      tipEnabled: boolean;
    }
  | { type: "subscribe"; creator: Address }
  | { type: "tip"; contentId: ContentId; amount: Big }
  | { type: "engage"; contentId: ContentId; engagementType: string };

export type CallType = LedgerCall["type"];

/* ── notifications ───────────────────────────────────────── */
export type LedgerEvent =
  | {
      type: "CreatorRegistered";
      creator: Address;
      profileData: string;
      timestamp: Timestamp;
    }
  | { type: "SubscriptionFeeUpdated"; creator: Address; fee: Big }
  | {
      type: "ContentPosted";
      contentId: ContentId;
      creator: Address;
      contentHash: string;
      isPremium: boolean;
    }
  | {
      type: "Subscribed";
      subscriber: Address;
      creator: Address;
      expiry: Timestamp;
    }
  | { type: "Tipped"; contentId: ContentId; tipper: Address; amount: Big }
  | {
      type: "Engaged";
      contentId: ContentId;
      user: Address;
      engagementType: string;
    };

/* ── collaborators ───────────────────────────────────────── */
export interface PaymentPort {
  /** Moves `amount` of the payment token. Returns false when the transfer did not happen. */
  transfer(from: Address, to: Address, amount: Big): boolean;
}

export interface EventSink {
  emit(event: LedgerEvent): void;
}

export interface CallContext {
  caller: Address;
  now: Timestamp;
  config: LedgerConfig;
  payments: PaymentPort;
}

export interface ApplyResult {
  events: LedgerEvent[];
  contentId?: ContentId;
}
