import { randomBytes } from "node:crypto";

/**
 * Build a filename stem that cannot collide with another produced in the
 * same process or an earlier run: prefix, epoch milliseconds, random hex.
 */
export function uniqueStem(prefix: string, now: number = Date.now()): string {
  return `${prefix}_${now}_${randomBytes(3).toString("hex")}`;
}

/**
 * Pad a number to at least `width` digits with leading zeros.
 */
export function zeroPad(n: number, width: number = 3): string {
  return String(n).padStart(width, "0");
}
