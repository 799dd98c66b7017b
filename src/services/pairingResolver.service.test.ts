/**
 * Pairing Resolver Tests
 *
 * Covers: symmetry, idempotence, malformed declarations, partner order
 */

import { describe, it, expect } from "vitest";
import { partnersOf, resolvePairs } from "./pairingResolver.service";

describe("resolvePairs", () => {
  it("links both exercises of a declaration", () => {
    const adjacency = resolvePairs([[2, 4]]);

    expect(partnersOf(adjacency, 2)).toEqual([4]);
    expect(partnersOf(adjacency, 4)).toEqual([2]);
    expect(partnersOf(adjacency, 3)).toEqual([]);
  });

  it("is symmetric across every accepted declaration", () => {
    const adjacency = resolvePairs([
      [1, 2],
      [3, 1],
      [5, 6],
    ]);

    for (const [id, partners] of adjacency) {
      for (const partner of partners) {
        expect(adjacency.get(partner)?.has(id)).toBe(true);
      }
    }
    expect(partnersOf(adjacency, 1)).toEqual([2, 3]);
  });

  it("treats a repeated declaration as a single one", () => {
    const once = resolvePairs([[1, 2]]);
    const twice = resolvePairs([
      [1, 2],
      [2, 1],
      [1, 2],
    ]);

    expect(twice).toEqual(once);
  });

  it("skips empty, short, self and non-numeric declarations", () => {
    const adjacency = resolvePairs([[], [7], [3, 3], ["bench", 4], [1.5, 2], [null, 5]]);

    expect(adjacency.size).toBe(0);
  });

  it("reads only the first two values and accepts numeric strings", () => {
    const adjacency = resolvePairs([["8", " 9 ", 10]]);

    expect(partnersOf(adjacency, 8)).toEqual([9]);
    expect(partnersOf(adjacency, 9)).toEqual([8]);
    expect(adjacency.has(10)).toBe(false);
  });

  it("keeps partners in declaration order", () => {
    const adjacency = resolvePairs([
      [1, 5],
      [1, 3],
      [4, 1],
    ]);

    expect(partnersOf(adjacency, 1)).toEqual([5, 3, 4]);
  });
});
