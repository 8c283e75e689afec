import { keccak_256 as keccak } from "@noble/hashes/sha3";
import { bytesToHex } from "@noble/hashes/utils";
import { concat } from "uint8arrays";
import { encCall, encEvent, encSnapshotRows } from "../codec/rlp";
import type { LedgerSnapshot } from "./store";
import type { Address, Hex, LedgerCall, LedgerEvent } from "./types";

export const toHex = (b: Uint8Array): Hex => `0x${bytesToHex(b)}`;

/* ── Merkle helper ───────────────────────────────────────── */
export const merkle = (leaves: Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) return keccak(new Uint8Array(0));
  if (leaves.length === 1) return leaves[0];
  const next: Uint8Array[] = [];
  for (let i = 0; i < leaves.length; i += 2) {
    const left = leaves[i];
    const right = i + 1 < leaves.length ? leaves[i + 1] : left;
    next.push(keccak(concat([left, right])));
  }
  return merkle(next);
};

/* ── per-call hashes ─────────────────────────────────────── */
export const hashCall = (caller: Address, call: LedgerCall): Hex =>
  toHex(keccak(encCall(caller, call)));

export const computeEventsRoot = (events: readonly LedgerEvent[]): Hex =>
  toHex(merkle(events.map((e) => keccak(encEvent(e)))));

/* ── ledger state root ───────────────────────────────────── */
// Rows arrive sorted per table from MemoryStore.snapshot(); leaf order is fixed.
export const computeStateRoot = (snapshot: LedgerSnapshot): Hex =>
  toHex(merkle(encSnapshotRows(snapshot).map((row) => keccak(row))));
