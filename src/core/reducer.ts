import { fail } from "./errors";
import { StagedStore, type LedgerStore } from "./store";
import type {
  Address,
  ApplyResult,
  CallContext,
  ContentId,
  CreatorStats,
  LedgerCall,
} from "./types";
import { isSubscribedAt, ZERO_STATS } from "./view";

// Constants
export const SUBSCRIPTION_PERIOD = 30n * 24n * 60n * 60n; // 30 days, seconds
export const MAX_PROFILE_BYTES = 31;
export const BPS_DENOMINATOR = 10_000n;

/* ── helpers ─────────────────────────────────────────────── */

export const platformFeeOf = (amount: bigint, feeBps: number): bigint =>
  (amount * BigInt(feeBps)) / BPS_DENOMINATOR;

const requireCreator = (store: LedgerStore, creator: Address): CreatorStats => {
  const stats = store.getStats(creator);
  if (store.getProfile(creator) === undefined || !stats)
    return fail("NotACreator", `${creator} is not a registered creator`);
  return stats;
};

const requireContent = (store: LedgerStore, id: ContentId) => {
  const content = store.getContent(id);
  if (!content) return fail("NotFound", `content ${id} does not exist`);
  return content;
};

/**
 * Pays `to` its share and the treasury the platform fee. The treasury check
 * runs before either transfer; a refused leg rejects the whole call.
 */
const collect = (
  ctx: CallContext,
  store: LedgerStore,
  to: Address,
  amount: bigint,
) => {
  const { caller, config, payments } = ctx;
  const fee = platformFeeOf(amount, config.platformFeeBps);
  const { treasury } = config;
  if (fee > 0n && treasury === undefined)
    fail("PaymentFailed", `platform fee of ${fee} has no treasury to go to`);

  if (!payments.transfer(caller, to, amount - fee))
    fail("PaymentFailed", `transfer of ${amount - fee} from ${caller} to ${to} failed`);
  if (fee > 0n && treasury !== undefined) {
    if (!payments.transfer(caller, treasury, fee))
      fail("PaymentFailed", `fee transfer of ${fee} from ${caller} to ${treasury} failed`);
    store.setPlatformFees(store.getPlatformFees() + fee);
  }
};

/* ── call-level reducer ──────────────────────────────────── */
/**
 * Applies one call to `store`. Every precondition is checked before the first
 * write; run it against a {@link StagedStore} (see {@link executeCall}) so a
 * collaborator throwing mid-call cannot leave a partial update behind.
 */
export const applyCall = (
  store: LedgerStore,
  call: LedgerCall,
  ctx: CallContext,
): ApplyResult => {
  const { caller, now } = ctx;

  switch (call.type) {
    /* ---------- creators ------------------------------------------ */
    case "register": {
      const size = Buffer.byteLength(call.profileData, "utf8");
      if (size === 0 || size > MAX_PROFILE_BYTES)
        fail("InvalidProfileData", `profile data must be 1..${MAX_PROFILE_BYTES} bytes`);
      if (store.getProfile(caller) !== undefined)
        fail("AlreadyRegistered", `${caller} is already registered`);

      store.setProfile(caller, call.profileData);
      store.setStats(caller, ZERO_STATS);
      return {
        events: [
          {
            type: "CreatorRegistered",
            creator: caller,
            profileData: call.profileData,
            timestamp: now,
          },
        ],
      };
    }

    case "setSubscriptionFee": {
      const stats = requireCreator(store, caller);
      if (call.fee < 0n) fail("InvalidAmount", "fee cannot be negative");

      store.setStats(caller, { ...stats, subscriptionFee: call.fee });
      return {
        events: [{ type: "SubscriptionFeeUpdated", creator: caller, fee: call.fee }],
      };
    }

    /* ---------- content ------------------------------------------- */
    case "postContent": {
      const stats = requireCreator(store, caller);
      const contentId = store.getContentCount();

      store.setContent(contentId, {
        creator: caller,
        contentHash: call.contentHash,
        timestamp: now,
        isPremium: call.isPremium,
        tipEnabled: call.tipEnabled,
        totalTips: 0n,
        totalEngagements: 0n,
      });
      store.setContentCount(contentId + 1n);
      store.setStats(caller, { ...stats, totalContent: stats.totalContent + 1n });
      return {
        contentId,
        events: [
          {
            type: "ContentPosted",
            contentId,
            creator: caller,
            contentHash: call.contentHash,
            isPremium: call.isPremium,
          },
        ],
      };
    }

    /* ---------- subscriptions ------------------------------------- */
    case "subscribe": {
      const stats = requireCreator(store, call.creator);
      if (stats.subscriptionFee === 0n)
        fail("SubscriptionsNotEnabled", `${call.creator} has subscriptions disabled`);

      collect(ctx, store, call.creator, stats.subscriptionFee);

      // Overwrites any earlier record: the window restarts, and the counter
      // counts subscription events rather than distinct subscribers.
      const expiry = now + SUBSCRIPTION_PERIOD;
      store.setSubscription(caller, call.creator, { active: true, expiry });
      store.setStats(call.creator, {
        ...stats,
        totalSubscribers: stats.totalSubscribers + 1n,
      });
      return {
        events: [
          { type: "Subscribed", subscriber: caller, creator: call.creator, expiry },
        ],
      };
    }

    /* ---------- tips ---------------------------------------------- */
    case "tip": {
      const content = requireContent(store, call.contentId);
      if (!content.tipEnabled)
        fail("TippingNotEnabled", `content ${call.contentId} does not accept tips`);
      if (call.amount <= 0n) fail("InvalidAmount", "tip amount must be positive");
      const stats = requireCreator(store, content.creator);

      collect(ctx, store, content.creator, call.amount);

      store.setContent(call.contentId, {
        ...content,
        totalTips: content.totalTips + call.amount,
      });
      store.setStats(content.creator, {
        ...stats,
        totalTipsReceived: stats.totalTipsReceived + call.amount,
      });
      return {
        events: [
          {
            type: "Tipped",
            contentId: call.contentId,
            tipper: caller,
            amount: call.amount,
          },
        ],
      };
    }

    /* ---------- engagement ---------------------------------------- */
    case "engage": {
      const content = requireContent(store, call.contentId);
      if (store.hasEngaged(call.contentId, caller))
        fail("AlreadyEngaged", `${caller} already engaged with content ${call.contentId}`);
      if (content.isPremium && !isSubscribedAt(store, caller, content.creator, now))
        fail("NotSubscribed", `${caller} has no active subscription to ${content.creator}`);

      store.markEngaged(call.contentId, caller);
      store.setContent(call.contentId, {
        ...content,
        totalEngagements: content.totalEngagements + 1n,
      });
      store.setEngagementScore(caller, store.getEngagementScore(caller) + 1n);
      return {
        events: [
          {
            type: "Engaged",
            contentId: call.contentId,
            user: caller,
            engagementType: call.engagementType,
          },
        ],
      };
    }
  }
};

/* ── all-or-nothing wrapper ──────────────────────────────── */
/**
 * Runs `applyCall` against a staged overlay of `base` and commits only when
 * the call succeeds. Rejections rethrow with `base` untouched.
 */
export const executeCall = (
  base: LedgerStore,
  call: LedgerCall,
  ctx: CallContext,
): ApplyResult => {
  const staged = new StagedStore(base);
  const result = applyCall(staged, call, ctx);
  staged.commit();
  return result;
};
