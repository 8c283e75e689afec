import type {
  Address,
  ContentId,
  Content,
  CreatorStats,
  Subscription,
} from "./types";

/** Typed get/set per table. Missing rows read as `undefined` (or zero for counters). */
export interface LedgerStore {
  getProfile(creator: Address): string | undefined;
  setProfile(creator: Address, profileData: string): void;

  getStats(creator: Address): CreatorStats | undefined;
  setStats(creator: Address, stats: CreatorStats): void;

  getContent(id: ContentId): Content | undefined;
  setContent(id: ContentId, content: Content): void;
  getContentCount(): bigint;
  setContentCount(count: bigint): void;

  getSubscription(subscriber: Address, creator: Address): Subscription | undefined;
  setSubscription(subscriber: Address, creator: Address, sub: Subscription): void;

  hasEngaged(contentId: ContentId, user: Address): boolean;
  markEngaged(contentId: ContentId, user: Address): void;

  getEngagementScore(user: Address): bigint;
  setEngagementScore(user: Address, score: bigint): void;

  getPlatformFees(): bigint;
  setPlatformFees(total: bigint): void;
}

/* ── snapshot used for state roots ───────────────────────── */
export interface LedgerSnapshot {
  profiles: [Address, string][];
  stats: [Address, CreatorStats][];
  contents: [ContentId, Content][];
  contentCount: bigint;
  subscriptions: [Address, Address, Subscription][];
  engagements: [ContentId, Address][];
  engagementScores: [Address, bigint][];
  platformFees: bigint;
}

const pairKey = (a: string, b: string) => `${a}:${b}`;
const byKey = <T>([a]: [string, T], [b]: [string, T]) =>
  a < b ? -1 : a > b ? 1 : 0;

/* ── in-memory tables ────────────────────────────────────── */
export class MemoryStore implements LedgerStore {
  private profiles = new Map<Address, string>();
  private stats = new Map<Address, CreatorStats>();
  private contents = new Map<ContentId, Content>();
  private contentCount = 0n;
  private subscriptions = new Map<
    string,
    { subscriber: Address; creator: Address; sub: Subscription }
  >();
  private engagements = new Map<string, { contentId: ContentId; user: Address }>();
  private scores = new Map<Address, bigint>();
  private platformFees = 0n;

  getProfile(creator: Address) {
    return this.profiles.get(creator);
  }
  setProfile(creator: Address, profileData: string) {
    this.profiles.set(creator, profileData);
  }

  getStats(creator: Address) {
    return this.stats.get(creator);
  }
  setStats(creator: Address, stats: CreatorStats) {
    this.stats.set(creator, stats);
  }

  getContent(id: ContentId) {
    return this.contents.get(id);
  }
  setContent(id: ContentId, content: Content) {
    this.contents.set(id, content);
  }
  getContentCount() {
    return this.contentCount;
  }
  setContentCount(count: bigint) {
    this.contentCount = count;
  }

  getSubscription(subscriber: Address, creator: Address) {
    return this.subscriptions.get(pairKey(subscriber, creator))?.sub;
  }
  setSubscription(subscriber: Address, creator: Address, sub: Subscription) {
    this.subscriptions.set(pairKey(subscriber, creator), { subscriber, creator, sub });
  }

  hasEngaged(contentId: ContentId, user: Address) {
    return this.engagements.has(pairKey(contentId.toString(), user));
  }
  markEngaged(contentId: ContentId, user: Address) {
    this.engagements.set(pairKey(contentId.toString(), user), { contentId, user });
  }

  getEngagementScore(user: Address) {
    return this.scores.get(user) ?? 0n;
  }
  setEngagementScore(user: Address, score: bigint) {
    this.scores.set(user, score);
  }

  getPlatformFees() {
    return this.platformFees;
  }
  setPlatformFees(total: bigint) {
    this.platformFees = total;
  }

  /** Every table, sorted by key, so equal stores give equal snapshots. */
  snapshot(): LedgerSnapshot {
    return {
      profiles: [...this.profiles.entries()].sort(byKey),
      stats: [...this.stats.entries()].sort(byKey),
      contents: [...this.contents.entries()].sort(([a], [b]) =>
        a < b ? -1 : a > b ? 1 : 0,
      ),
      contentCount: this.contentCount,
      subscriptions: [...this.subscriptions.entries()]
        .sort(byKey)
        .map(([, r]): [Address, Address, Subscription] => [r.subscriber, r.creator, r.sub]),
      engagements: [...this.engagements.entries()]
        .sort(byKey)
        .map(([, r]): [ContentId, Address] => [r.contentId, r.user]),
      engagementScores: [...this.scores.entries()].sort(byKey),
      platformFees: this.platformFees,
    };
  }
}

/* ── staged overlay: writes land here until commit() ─────── */
export class StagedStore implements LedgerStore {
  private readonly writes = new MemoryStore();
  private readonly journal: ((target: LedgerStore) => void)[] = [];
  private countWritten = false;
  private feesWritten = false;
  private readonly scoresWritten = new Set<Address>();

  constructor(private readonly base: LedgerStore) {}

  private record(op: (target: LedgerStore) => void) {
    op(this.writes);
    this.journal.push(op);
  }

  getProfile(creator: Address) {
    return this.writes.getProfile(creator) ?? this.base.getProfile(creator);
  }
  setProfile(creator: Address, profileData: string) {
    this.record((t) => t.setProfile(creator, profileData));
  }

  getStats(creator: Address) {
    return this.writes.getStats(creator) ?? this.base.getStats(creator);
  }
  setStats(creator: Address, stats: CreatorStats) {
    this.record((t) => t.setStats(creator, stats));
  }

  getContent(id: ContentId) {
    return this.writes.getContent(id) ?? this.base.getContent(id);
  }
  setContent(id: ContentId, content: Content) {
    this.record((t) => t.setContent(id, content));
  }
  getContentCount() {
    return this.countWritten
      ? this.writes.getContentCount()
      : this.base.getContentCount();
  }
  setContentCount(count: bigint) {
    this.countWritten = true;
    this.record((t) => t.setContentCount(count));
  }

  getSubscription(subscriber: Address, creator: Address) {
    return (
      this.writes.getSubscription(subscriber, creator) ??
      this.base.getSubscription(subscriber, creator)
    );
  }
  setSubscription(subscriber: Address, creator: Address, sub: Subscription) {
    this.record((t) => t.setSubscription(subscriber, creator, sub));
  }

  hasEngaged(contentId: ContentId, user: Address) {
    return (
      this.writes.hasEngaged(contentId, user) ||
      this.base.hasEngaged(contentId, user)
    );
  }
  markEngaged(contentId: ContentId, user: Address) {
    this.record((t) => t.markEngaged(contentId, user));
  }

  getEngagementScore(user: Address) {
    return this.scoresWritten.has(user)
      ? this.writes.getEngagementScore(user)
      : this.base.getEngagementScore(user);
  }
  setEngagementScore(user: Address, score: bigint) {
    this.scoresWritten.add(user);
    this.record((t) => t.setEngagementScore(user, score));
  }

  getPlatformFees() {
    return this.feesWritten
      ? this.writes.getPlatformFees()
      : this.base.getPlatformFees();
  }
  setPlatformFees(total: bigint) {
    this.feesWritten = true;
    this.record((t) => t.setPlatformFees(total));
  }

  get pendingWrites(): number {
    return this.journal.length;
  }

  /** Replays the staged writes onto the base store, in order. */
  commit() {
    for (const op of this.journal) op(this.base);
    this.journal.length = 0;
  }
}
