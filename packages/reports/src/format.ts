/**
 * Fixed-width field helpers for report rows.
 */

/** Decimal, right-aligned in `width` columns. */
export function dec(value: number, width = 0): string {
  return String(Math.trunc(value)).padStart(width);
}

/** Lower-case hex without prefix, zero-padded to `digits`. Negative values wrap to 64 bits. */
export function hex(value: number, digits: number): string {
  const int = Math.trunc(value);
  const text = int < 0 ? BigInt.asUintN(64, BigInt(int)).toString(16) : int.toString(16);
  return text.padStart(digits, "0");
}

/** Truncated to `width` characters, then right-aligned. */
export function fixed(value: string, width: number): string {
  return value.slice(0, width).padStart(width);
}

/** Truncated to `width` characters, then left-aligned. */
export function left(value: string, width: number): string {
  return value.slice(0, width).padEnd(width);
}

export function flag(set: boolean, on: string, off = "-"): string {
  return set ? on : off;
}
