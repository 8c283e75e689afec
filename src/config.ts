import {
  integer,
  number,
  object,
  optional,
  picklist,
  pipe,
  safeParse,
  string,
  transform,
} from "valibot";
import type { LevelWithSilent } from "pino";
import { fail } from "./core/errors";
import type { LedgerConfig } from "./core/types";
import { addressSchema, describeIssues } from "./model/validation";

export const MAX_PLATFORM_FEE_BPS = 1000; // 10%

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LevelWithSilent[];

const ledgerConfigSchema = object({
  paymentToken: addressSchema,
  platformFeeBps: pipe(number(), integer()),
  treasury: optional(addressSchema),
});

/** Fixed once at ledger creation. */
export const createLedgerConfig = (input: {
  paymentToken: string;
  platformFeeBps: number;
  treasury?: string;
}): LedgerConfig => {
  const result = safeParse(ledgerConfigSchema, input);
  if (!result.success) return fail("InvalidConfig", describeIssues(result.issues));
  const { platformFeeBps } = result.output;
  if (platformFeeBps > MAX_PLATFORM_FEE_BPS)
    fail("FeeTooHigh", `platform fee ${platformFeeBps} bps exceeds ${MAX_PLATFORM_FEE_BPS}`);
  if (platformFeeBps < 0) fail("InvalidConfig", "platform fee cannot be negative");
  return Object.freeze({ ...result.output });
};

const envSchema = object({
  PAYMENT_TOKEN: string(),
  PLATFORM_FEE_BPS: pipe(
    optional(string(), "0"),
    transform((s: string) => Number(s)),
  ),
  TREASURY: optional(string()),
  LOG_LEVEL: optional(picklist(LOG_LEVELS), "info"),
  LOG_PRETTY: pipe(
    optional(picklist(["true", "false", "1", "0"]), "false"),
    transform((v) => v === "true" || v === "1"),
  ),
});

export interface AppConfig {
  ledger: LedgerConfig;
  logLevel: LevelWithSilent;
  logPretty: boolean;
}

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): AppConfig => {
  const result = safeParse(envSchema, env);
  if (!result.success) return fail("InvalidConfig", describeIssues(result.issues));
  const e = result.output;
  return {
    ledger: createLedgerConfig({
      paymentToken: e.PAYMENT_TOKEN,
      platformFeeBps: e.PLATFORM_FEE_BPS,
      treasury: e.TREASURY,
    }),
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY,
  };
};
