import { describe, it, expect } from "vitest";
import { generateDataset, makeRecord } from "../dataset.ts";
import { InvalidSizeError } from "../errors.ts";

describe("generateDataset", () => {
  it("returns exactly size records numbered 1..size in order", () => {
    for (const size of [1, 5, 250]) {
      const records = generateDataset(size);
      expect(records).toHaveLength(size);
      expect(records.map((r) => r.seq)).toEqual(Array.from({ length: size }, (_, i) => i + 1));
      expect(new Set(records.map((r) => r.seq)).size).toBe(size);
    }
  });

  it("derives field content from the sequence number", () => {
    expect(makeRecord(1)).toEqual({ seq: 1, name: "Record 1", price: 1.37, quantity: 8 });
    expect(makeRecord(50)).toEqual({ seq: 50, name: "Record 50", price: 19.5, quantity: 1 });
    expect(generateDataset(3)).toEqual([makeRecord(1), makeRecord(2), makeRecord(3)]);
  });

  it("is deterministic across calls", () => {
    expect(generateDataset(20)).toEqual(generateDataset(20));
  });

  it("rejects sizes that are not positive integers", () => {
    expect(() => generateDataset(0)).toThrow(InvalidSizeError);
    expect(() => generateDataset(-3)).toThrow(InvalidSizeError);
    expect(() => generateDataset(2.5)).toThrow("dataset size must be a positive integer, got 2.5");
  });
});
