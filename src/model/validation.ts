import {
  bigint,
  boolean,
  literal,
  minLength,
  minValue,
  number,
  integer,
  object,
  pipe,
  regex,
  safeParse,
  string,
  transform,
  union,
  variant,
  type BaseIssue,
} from "valibot";
import { fail } from "../core/errors";
import type { Address, LedgerCall } from "../core/types";

const toAddress = (s: string): Address => `0x${s.slice(2).toLowerCase()}`;

export const addressSchema = pipe(
  string(),
  regex(/^0x[0-9a-fA-F]{40}$/, "expected a 0x-prefixed 20-byte address"),
  transform(toAddress),
);

// bigint, decimal string, or safe integer (JSON cannot carry bigint)
export const uintSchema = union([
  pipe(bigint(), minValue(0n)),
  pipe(string(), regex(/^\d+$/, "expected an unsigned decimal"), transform((s: string) => BigInt(s))),
  pipe(number(), integer(), minValue(0), transform((n: number) => BigInt(n))),
]);

export const callSchema = variant("type", [
  object({ type: literal("register"), profileData: string() }),
  object({ type: literal("setSubscriptionFee"), fee: uintSchema }),
  object({
    type: literal("postContent"),
    contentHash: string(),
    isPremium: boolean(),
    tipEnabled: boolean(),
  }),
  object({ type: literal("subscribe"), creator: addressSchema }),
  object({ type: literal("tip"), contentId: uintSchema, amount: uintSchema }),
  object({
    type: literal("engage"),
    contentId: uintSchema,
    engagementType: pipe(string(), minLength(1, "engagement type is empty")),
  }),
]);

export const describeIssues = (issues: readonly BaseIssue<unknown>[]) =>
  issues.map((i) => i.message).join("; ");

/** Validates an untrusted call payload. */
export const decodeCall = (input: unknown): LedgerCall => {
  const result = safeParse(callSchema, input);
  if (!result.success) return fail("InvalidCall", describeIssues(result.issues));
  return result.output;
};

export const parseAddress = (input: unknown): Address => {
  const result = safeParse(addressSchema, input);
  if (!result.success) return fail("InvalidCall", describeIssues(result.issues));
  return result.output;
};
