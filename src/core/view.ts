import { fail } from "./errors";
import type { LedgerStore } from "./store";
import type {
  Address,
  Content,
  ContentId,
  CreatorStats,
  LedgerConfig,
  Subscription,
  Timestamp,
} from "./types";

export const ZERO_STATS: CreatorStats = {
  totalSubscribers: 0n,
  totalContent: 0n,
  totalTipsReceived: 0n,
  subscriptionFee: 0n,
  engagementScore: 0n,
};

/** Active and not yet expired. Expiry equal to `now` counts as expired. */
export const isSubscribedAt = (
  store: LedgerStore,
  user: Address,
  creator: Address,
  now: Timestamp,
): boolean => {
  const sub = store.getSubscription(user, creator);
  return sub !== undefined && sub.active && sub.expiry > now;
};

/**
 * Side-effect-free accessors over a store. The clock is only read by
 * `isSubscribed`.
 */
export class LedgerView {
  constructor(
    private readonly store: LedgerStore,
    private readonly ledgerConfig: LedgerConfig,
    private readonly now: () => Timestamp,
  ) {}

  creatorStats(creator: Address): CreatorStats {
    return this.store.getStats(creator) ?? ZERO_STATS;
  }

  creatorProfile(creator: Address): string | undefined {
    return this.store.getProfile(creator);
  }

  isCreator(address: Address): boolean {
    return this.store.getProfile(address) !== undefined;
  }

  content(id: ContentId): Content {
    const c = this.store.getContent(id);
    if (!c) return fail("NotFound", `content ${id} does not exist`);
    return c;
  }

  contentCount(): bigint {
    return this.store.getContentCount();
  }

  userEngagementScore(user: Address): bigint {
    return this.store.getEngagementScore(user);
  }

  hasEngaged(contentId: ContentId, user: Address): boolean {
    return this.store.hasEngaged(contentId, user);
  }

  subscription(user: Address, creator: Address): Subscription | undefined {
    return this.store.getSubscription(user, creator);
  }

  isSubscribed(user: Address, creator: Address): boolean {
    return isSubscribedAt(this.store, user, creator, this.now());
  }

  platformFeesAccrued(): bigint {
    return this.store.getPlatformFees();
  }

  config(): LedgerConfig {
    return this.ledgerConfig;
  }
}
