import * as crypto from "crypto";

/**
 * Calendar day of `date` in local time, as YYYY-MM-DD.
 */
export function toIsoDate(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, "0");
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/**
 * Stable index in [0, total) for a calendar day.
 *
 * SHA-256 of the ISO date, first 8 bytes read as an unsigned big-endian
 * 64-bit integer, modulo `total`. Same day + same total = same index on
 * every deployment. Returns 0 when `total` is not positive.
 */
export function deterministicIndex(total: number, date: Date = new Date()): number {
  if (!Number.isInteger(total) || total <= 0) {
    return 0;
  }
  const digest = crypto.createHash("sha256").update(toIsoDate(date), "utf8").digest();
  const value = digest.readBigUInt64BE(0);
  return Number(value % BigInt(total));
}
