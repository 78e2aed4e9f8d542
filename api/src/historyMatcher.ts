// historyMatcher.ts
// Last-performance lookups used to pre-fill bulk entry. Matching key is
// (trainee, exact exercise name): no normalisation, so a renamed exercise
// starts without history.

import { describeError } from "./middleware/errorHandler.js";
import type { HistoryStore } from "./stores.js";
import type { HistoryRecord, Training } from "./types.js";

export type LastPerformances = Map<string, HistoryRecord | null>;

export class HistoryMatcher {
  constructor(private readonly store: HistoryStore) {}

  /** A failed lookup reads the same as "no prior performance". */
  async findLastPerformance(traineeId: string, exerciseName: string): Promise<HistoryRecord | null> {
    try {
      const record = await this.store.getLast(traineeId, exerciseName);
      return record && record.exerciseName === exerciseName && record.traineeId === traineeId
        ? record
        : null;
    } catch (err) {
      console.warn(`history: lookup failed for "${exerciseName}":`, describeError(err));
      return null;
    }
  }

  async findLastPerformances(traineeId: string, exerciseNames: string[]): Promise<LastPerformances> {
    const names = [...new Set(exerciseNames)];
    const found = await Promise.all(
      names.map(async (name) => [name, await this.findLastPerformance(traineeId, name)] as const)
    );
    return new Map(found);
  }

  forTraining(training: Training): Promise<LastPerformances> {
    return this.findLastPerformances(
      training.traineeId,
      training.exercises.map((ex) => ex.name)
    );
  }
}

export type BulkEntry = { reps: string; weight: string };
export type BulkEntries = Record<string, BulkEntry[]>;

/**
 * Input grid for bulk logging, one row per target set. A logged set wins,
 * then the same set of the last performance, then the target weight alone.
 */
export function prefillBulkEntries(training: Training, history: LastPerformances): BulkEntries {
  const grid: BulkEntries = {};
  for (const ex of training.exercises) {
    const last = history.get(ex.name) ?? null;
    const rows: BulkEntry[] = [];
    for (let i = 0; i < ex.sets; i++) {
      const logged = ex.actualSets[i];
      const previous = last?.actualSets[i];
      if (logged) {
        rows.push({ reps: String(logged.reps), weight: String(logged.weight) });
      } else if (previous) {
        rows.push({ reps: String(previous.reps), weight: String(previous.weight) });
      } else {
        rows.push({ reps: "", weight: ex.weight != null ? String(ex.weight) : "" });
      }
    }
    grid[ex.id] = rows;
  }
  return grid;
}
