/**
 * @pledgebook/ledger — Decimal unit conversion.
 *
 * Native amounts travel as unsigned decimal strings ("0.1" ether) at the
 * edges and as raw bigint units (wei) inside the ledger. Excess
 * fractional digits are an error, never rounded.
 */

import { LedgerError } from "./types.js";

const UNSIGNED_DECIMAL = /^(\d+)(?:\.(\d+))?$/;

/**
 * Raw units for an unsigned decimal string.
 *
 * parseAmount("0.1", 18) → 100000000000000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();
  const match = UNSIGNED_DECIMAL.exec(trimmed);
  if (match === null) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${amount}"`);
  }

  const whole = match[1] ?? "0";
  const fraction = match[2] ?? "";
  if (fraction.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fraction.length)} decimal places, but at most ${String(decimals)} are allowed`,
    );
  }

  return BigInt(whole + fraction.padEnd(decimals, "0"));
}

/**
 * Decimal string for raw units, always with every fractional digit.
 *
 * formatAmount(100000000000000000n, 18) → "0.100000000000000000"
 */
export function formatAmount(raw: bigint, decimals: number): string {
  if (raw < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must not be negative, got ${raw.toString()}`);
  }
  if (decimals === 0) {
    return raw.toString();
  }

  const digits = raw.toString().padStart(decimals + 1, "0");
  const split = digits.length - decimals;
  return `${digits.slice(0, split)}.${digits.slice(split)}`;
}
