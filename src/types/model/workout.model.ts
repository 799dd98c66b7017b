/**
 * A pair of exercise ids performed back-to-back. Stored exactly as loaded;
 * malformed declarations are ignored when pairs are resolved.
 */
export type PairedSetDeclaration = readonly unknown[];

export interface Workout {
  id: number;
  name: string;
  comment: string | null;
  exerciseIds: number[];
  pairedSets: PairedSetDeclaration[];
}
