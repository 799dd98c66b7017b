import { EntryRole, RepTargetKind } from "../common/common-enum";
import { CATALOG_CONSTANTS } from "../utils/constants";
import type { ExerciseCatalog, RepTarget } from "../types/model/exercise.model";
import type { AdjacencyMap, Block, SheetEntry } from "../types/model/sheet.model";
import { partnersOf } from "./pairingResolver.service";

/**
 * Walk the workout once and group each exercise with its directly paired,
 * not yet placed partners. Every id lands in exactly one block.
 *
 * Partners are pulled in one hop only: a partner's own partners are not
 * expanded into the same block. A chain a-b-c declared as (a,b), (b,c)
 * therefore yields [a, b] followed later by [c].
 */
export function sequenceBlocks(
  exerciseIds: readonly number[],
  adjacency: AdjacencyMap
): Block[] {
  const inWorkout = new Set(exerciseIds);
  const rendered = new Set<number>();
  const blocks: Block[] = [];

  for (const exerciseId of exerciseIds) {
    if (rendered.has(exerciseId)) continue;
    rendered.add(exerciseId);

    const partnerIds: number[] = [];
    for (const partnerId of partnersOf(adjacency, exerciseId)) {
      if (!inWorkout.has(partnerId) || rendered.has(partnerId)) continue;
      partnerIds.push(partnerId);
      rendered.add(partnerId);
    }

    blocks.push({ primaryId: exerciseId, partnerIds });
  }

  return blocks;
}

export function formatReps(reps: RepTarget | null): string | null {
  if (!reps) return null;
  if (reps.kind === RepTargetKind.TO_FAILURE) return `${reps.min}+`;
  return reps.min === reps.max ? `${reps.min}` : `${reps.min}-${reps.max}`;
}

export function missingExerciseName(exerciseId: number): string {
  return `Exercise #${exerciseId} (missing)`;
}

function toEntry(
  exerciseId: number,
  blockIndex: number,
  role: EntryRole,
  catalog: ExerciseCatalog
): SheetEntry {
  const exercise = catalog.get(exerciseId);
  if (!exercise) {
    return {
      exerciseId,
      blockIndex,
      role,
      name: missingExerciseName(exerciseId),
      sets: CATALOG_CONSTANTS.DEFAULT_SETS,
      repsText: null,
      comment: null,
      restSeconds: null,
      missing: true,
    };
  }

  return {
    exerciseId,
    blockIndex,
    role,
    name: exercise.name,
    sets: exercise.sets,
    repsText: formatReps(exercise.reps),
    comment: exercise.comment,
    restSeconds: exercise.restSeconds,
    missing: false,
  };
}

/** One entry list per block: the primary first, then its partners. */
export function buildEntryBlocks(
  blocks: readonly Block[],
  catalog: ExerciseCatalog
): SheetEntry[][] {
  return blocks.map((block, blockIndex) => [
    toEntry(block.primaryId, blockIndex, EntryRole.PRIMARY, catalog),
    ...block.partnerIds.map((partnerId) =>
      toEntry(partnerId, blockIndex, EntryRole.PARTNER, catalog)
    ),
  ]);
}
