import { InvalidSizeError } from "./errors.ts";
import type { BenchRecord } from "./types.ts";

/**
 * Synthetic catalogue records, identical for every backend and every run.
 * `seq` runs 1..size in order; price and quantity are derived from it.
 */
export function generateDataset(size: number): BenchRecord[] {
  if (!Number.isInteger(size) || size <= 0) throw new InvalidSizeError(size);
  return Array.from({ length: size }, (_, i) => makeRecord(i + 1));
}

export function makeRecord(seq: number): BenchRecord {
  const cents = 100 + ((seq * 37) % 10_000);
  return {
    seq,
    name: `Record ${seq}`,
    price: cents / 100,
    quantity: ((seq * 7) % 50) + 1,
  };
}
