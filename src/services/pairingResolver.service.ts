import type { PairedSetDeclaration } from "../types/model/workout.model";
import type { AdjacencyMap } from "../types/model/sheet.model";

const toExerciseId = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return parseInt(value, 10);
  }
  return null;
};

const link = (adjacency: AdjacencyMap, from: number, to: number) => {
  const partners = adjacency.get(from);
  if (partners) {
    partners.add(to);
  } else {
    adjacency.set(from, new Set([to]));
  }
};

/**
 * Build the symmetric partner relation from a workout's paired-set
 * declarations. Only the first two values of a declaration are read.
 * Empty, short, non-numeric and self-pairs are skipped; this never throws.
 *
 * Partner sets keep insertion order, which is the order the sequencer
 * discovers partners in.
 */
export function resolvePairs(
  declarations: readonly PairedSetDeclaration[]
): AdjacencyMap {
  const adjacency: AdjacencyMap = new Map();

  for (const declaration of declarations) {
    if (declaration.length < 2) continue;

    const a = toExerciseId(declaration[0]);
    const b = toExerciseId(declaration[1]);
    if (a === null || b === null || a === b) continue;

    link(adjacency, a, b);
    link(adjacency, b, a);
  }

  return adjacency;
}

export function partnersOf(adjacency: AdjacencyMap, exerciseId: number): number[] {
  return [...(adjacency.get(exerciseId) ?? [])];
}
