// Canonical RLP encoders for calls and table rows. Hashing only; nothing is decoded back.
// Strings go in as UTF-8 bytes: rlp reads a bare "0x…" string as hex.

import * as rlp from "rlp";
import { utf8ToBytes } from "@noble/hashes/utils";
import type { Address, LedgerCall, LedgerEvent } from "../core/types";
import type { LedgerSnapshot } from "../core/store";

const flag = (b: boolean) => (b ? 1 : 0);
const str = (s: string) => utf8ToBytes(s);
const addr = (a: Address) => utf8ToBytes(a);
// call arguments are unchecked until the reducer runs, so amounts may be negative
const int = (n: bigint) => (n < 0n ? [1, -n] : [0, n]);

/* — call — */
export const encCall = (caller: Address, c: LedgerCall): Uint8Array => {
  const who = addr(caller);
  const tag = str(c.type);
  switch (c.type) {
    case "register":
      return rlp.encode([who, tag, str(c.profileData)]);
    case "setSubscriptionFee":
      return rlp.encode([who, tag, int(c.fee)]);
    case "postContent":
      return rlp.encode([
        who,
        tag,
        str(c.contentHash),
        flag(c.isPremium),
        flag(c.tipEnabled),
      ]);
    case "subscribe":
      return rlp.encode([who, tag, addr(c.creator)]);
    case "tip":
      return rlp.encode([who, tag, int(c.contentId), int(c.amount)]);
    case "engage":
      return rlp.encode([who, tag, int(c.contentId), str(c.engagementType)]);
  }
};

/* — event — */
export const encEvent = (e: LedgerEvent): Uint8Array => {
  switch (e.type) {
    case "CreatorRegistered":
      return rlp.encode([str(e.type), addr(e.creator), str(e.profileData), e.timestamp]);
    case "SubscriptionFeeUpdated":
      return rlp.encode([str(e.type), addr(e.creator), e.fee]);
    case "ContentPosted":
      return rlp.encode([
        str(e.type),
        e.contentId,
        addr(e.creator),
        str(e.contentHash),
        flag(e.isPremium),
      ]);
    case "Subscribed":
      return rlp.encode([str(e.type), addr(e.subscriber), addr(e.creator), e.expiry]);
    case "Tipped":
      return rlp.encode([str(e.type), e.contentId, addr(e.tipper), e.amount]);
    case "Engaged":
      return rlp.encode([str(e.type), e.contentId, addr(e.user), str(e.engagementType)]);
  }
};

/* — table rows, one leaf each, tagged by table — */
export const encSnapshotRows = (s: LedgerSnapshot): Uint8Array[] => [
  ...s.profiles.map(([a, data]) => rlp.encode([str("profile"), addr(a), str(data)])),
  ...s.stats.map(([a, st]) =>
    rlp.encode([
      str("stats"),
      addr(a),
      st.totalSubscribers,
      st.totalContent,
      st.totalTipsReceived,
      st.subscriptionFee,
      st.engagementScore,
    ]),
  ),
  ...s.contents.map(([id, c]) =>
    rlp.encode([
      str("content"),
      id,
      addr(c.creator),
      str(c.contentHash),
      c.timestamp,
      flag(c.isPremium),
      flag(c.tipEnabled),
      c.totalTips,
      c.totalEngagements,
    ]),
  ),
  rlp.encode([str("contentCount"), s.contentCount]),
  ...s.subscriptions.map(([sub, creator, r]) =>
    rlp.encode([str("subscription"), addr(sub), addr(creator), flag(r.active), r.expiry]),
  ),
  ...s.engagements.map(([id, user]) => rlp.encode([str("engaged"), id, addr(user)])),
  ...s.engagementScores.map(([user, score]) =>
    rlp.encode([str("score"), addr(user), score]),
  ),
  rlp.encode([str("platformFees"), s.platformFees]),
];
