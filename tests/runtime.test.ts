import { describe, it, expect } from "vitest";
import { LedgerError } from "../src/core/errors";
import { hashCall } from "../src/core/hash";
import { SUBSCRIPTION_PERIOD } from "../src/core/reducer";
import type { EventSink } from "../src/core/types";
import {
  CREATOR,
  FAN,
  FAN_2,
  T0,
  engage,
  mkRuntime,
  post,
  receiptCode,
  register,
  rejectAll,
  setFee,
  subscribe,
  tip,
} from "./helpers/ledger";

describe("LedgerRuntime", () => {
  it("premium engagement walk-through", () => {
    const { runtime, sink } = mkRuntime();

    expect(receiptCode(runtime.submit(CREATOR, register("creator")))).toBe("ok");
    const posted = runtime.submit(CREATOR, post("hash1", true, true));
    expect(posted.ok && posted.contentId).toBe(0n);

    expect(receiptCode(runtime.submit(FAN, engage(0n, "LIKE")))).toBe("NotSubscribed");

    expect(receiptCode(runtime.submit(CREATOR, setFee(100n)))).toBe("ok");
    expect(receiptCode(runtime.submit(FAN, subscribe(CREATOR)))).toBe("ok");
    expect(runtime.view.creatorStats(CREATOR).totalSubscribers).toBe(1n);

    expect(receiptCode(runtime.submit(FAN, engage(0n, "LIKE")))).toBe("ok");
    expect(runtime.view.content(0n).totalEngagements).toBe(1n);
    expect(runtime.view.userEngagementScore(FAN)).toBe(1n);

    expect(receiptCode(runtime.submit(FAN, engage(0n, "LIKE")))).toBe("AlreadyEngaged");

    expect(sink.events.map((e) => e.type)).toEqual([
      "CreatorRegistered",
      "ContentPosted",
      "SubscriptionFeeUpdated",
      "Subscribed",
      "Engaged",
    ]);
  });

  it("self-tip walk-through", () => {
    const { runtime } = mkRuntime();
    runtime.submit(CREATOR, register());
    runtime.submit(CREATOR, post("hash1", false, true));

    expect(receiptCode(runtime.submit(CREATOR, tip(0n, 0n)))).toBe("InvalidAmount");
    expect(receiptCode(runtime.submit(CREATOR, tip(0n, 50n)))).toBe("ok");
    expect(runtime.view.content(0n).totalTips).toBe(50n);
    expect(runtime.view.creatorStats(CREATOR).totalTipsReceived).toBe(50n);
  });

  it("returns a rejection receipt with the unchanged state root", () => {
    const { runtime, sink } = mkRuntime();
    runtime.submit(CREATOR, register());
    const before = runtime.stateRoot();

    const r = runtime.submit(CREATOR, register("again"));
    expect(r).toEqual({
      ok: false,
      caller: CREATOR,
      callHash: hashCall(CREATOR, register("again")),
      stateRoot: before,
      code: "AlreadyRegistered",
      message: `${CREATOR} is already registered`,
    });
    expect(sink.events).toHaveLength(1);
  });

  it("moves the state root on success", () => {
    const { runtime } = mkRuntime();
    const empty = runtime.stateRoot();
    const r = runtime.submit(CREATOR, register());
    expect(r.ok).toBe(true);
    expect(r.stateRoot).not.toBe(empty);
    expect(r.stateRoot).toBe(runtime.stateRoot());
  });

  it("keeps committing when the event sink throws", () => {
    const broken: EventSink = {
      emit: () => {
        throw new Error("sink offline");
      },
    };
    const { runtime } = mkRuntime({ sink: broken });
    const r = runtime.submit(CREATOR, register());
    expect(r.ok).toBe(true);
    expect(runtime.view.isCreator(CREATOR)).toBe(true);
  });

  it("reports PaymentFailed without touching counters", () => {
    const { runtime, sink } = mkRuntime({ payments: rejectAll });
    runtime.submit(CREATOR, register());
    runtime.submit(CREATOR, setFee(10n));
    const r = runtime.submit(FAN, subscribe(CREATOR));
    expect(receiptCode(r)).toBe("PaymentFailed");
    expect(runtime.view.creatorStats(CREATOR).totalSubscribers).toBe(0n);
    expect(runtime.view.isSubscribed(FAN, CREATOR)).toBe(false);
    expect(sink.events.map((e) => e.type)).toEqual([
      "CreatorRegistered",
      "SubscriptionFeeUpdated",
    ]);
  });

  it("returns InvalidAmount receipts for negative amounts", () => {
    const { runtime } = mkRuntime();
    runtime.submit(CREATOR, register());
    runtime.submit(CREATOR, post());
    const before = runtime.stateRoot();

    const fee = runtime.submit(CREATOR, setFee(-1n));
    expect(receiptCode(fee)).toBe("InvalidAmount");
    expect(fee.callHash).toBe(hashCall(CREATOR, setFee(-1n)));
    expect(fee.callHash).not.toBe(hashCall(CREATOR, setFee(1n)));
    expect(receiptCode(runtime.submit(FAN, tip(0n, -5n)))).toBe("InvalidAmount");
    expect(runtime.stateRoot()).toBe(before);
  });

  it("accepts opaque strings that look like hex", () => {
    const { runtime } = mkRuntime();
    expect(receiptCode(runtime.submit(CREATOR, register("0xzz")))).toBe("ok");
    expect(receiptCode(runtime.submit(CREATOR, post("0xQm")))).toBe("ok");
    expect(receiptCode(runtime.submit(FAN, engage(0n, "0xLIKE")))).toBe("ok");
    expect(runtime.view.creatorProfile(CREATOR)).toBe("0xzz");
    expect(runtime.view.content(0n).contentHash).toBe("0xQm");
  });

  it("rethrows errors that are not ledger rejections", () => {
    const { runtime } = mkRuntime({
      payments: {
        transfer: () => {
          throw new TypeError("bad adapter");
        },
      },
    });
    runtime.submit(CREATOR, register());
    runtime.submit(CREATOR, setFee(10n));
    expect(() => runtime.submit(FAN, subscribe(CREATOR))).toThrow(TypeError);
    expect(runtime.view.subscription(FAN, CREATOR)).toBeUndefined();
  });

  it("applies a batch in order and isolates failures", () => {
    const { runtime } = mkRuntime();
    const receipts = runtime.submitBatch([
      { caller: CREATOR, call: register() },
      { caller: FAN, call: post() },
      { caller: CREATOR, call: post("a") },
      { caller: CREATOR, call: post("b") },
    ]);
    expect(receipts.map(receiptCode)).toEqual(["ok", "NotACreator", "ok", "ok"]);
    expect(receipts.map((r) => (r.ok ? r.contentId : undefined))).toEqual([
      undefined,
      undefined,
      0n,
      1n,
    ]);
    expect(runtime.view.contentCount()).toBe(2n);
  });

  describe("view", () => {
    it("returns zero stats for unknown creators", () => {
      const { runtime } = mkRuntime();
      expect(runtime.view.creatorStats(FAN_2)).toEqual({
        totalSubscribers: 0n,
        totalContent: 0n,
        totalTipsReceived: 0n,
        subscriptionFee: 0n,
        engagementScore: 0n,
      });
      expect(runtime.view.creatorProfile(FAN_2)).toBeUndefined();
      expect(runtime.view.isCreator(FAN_2)).toBe(false);
    });

    it("throws NotFound for an unassigned content id", () => {
      const { runtime } = mkRuntime();
      expect(() => runtime.view.content(0n)).toThrow(LedgerError);
      expect(() => runtime.view.content(0n)).toThrow("content 0 does not exist");
    });

    it("expires subscriptions lazily against the clock", () => {
      const { runtime, clock } = mkRuntime();
      runtime.submit(CREATOR, register());
      runtime.submit(CREATOR, setFee(1n));
      runtime.submit(FAN, subscribe(CREATOR));

      expect(runtime.view.isSubscribed(FAN, CREATOR)).toBe(true);
      clock.now = T0 + SUBSCRIPTION_PERIOD;
      expect(runtime.view.isSubscribed(FAN, CREATOR)).toBe(false);
      expect(runtime.view.subscription(FAN, CREATOR)).toEqual({
        active: true,
        expiry: T0 + SUBSCRIPTION_PERIOD,
      });
    });

    it("exposes engagement marks and accrued platform fees", () => {
      const { runtime } = mkRuntime();
      runtime.submit(CREATOR, register());
      runtime.submit(CREATOR, post());
      runtime.submit(FAN, engage(0n));
      expect(runtime.view.hasEngaged(0n, FAN)).toBe(true);
      expect(runtime.view.hasEngaged(0n, FAN_2)).toBe(false);
      expect(runtime.view.platformFeesAccrued()).toBe(0n);
      expect(runtime.view.config().platformFeeBps).toBe(0);
    });
  });
});
