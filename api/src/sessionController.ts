// sessionController.ts
// One workout-logging session over a single Training aggregate.
//
// NotStarted → InProgress → Completed. A completed training can still be
// edited; every edit re-submits it with a fresh completedAt, and it never
// drops back to not completed.

import { describeError } from "./middleware/errorHandler.js";
import { readEnteredSet, validateSet, isValidActualSet } from "./setValidator.js";
import type { SetValidationCode } from "./setValidator.js";
import type { BulkEntries } from "./historyMatcher.js";
import { resolveMode, sessionState } from "./sessionMode.js";
import type { HistoryStore, TrainingStore } from "./stores.js";
import type { ActualSet, Exercise, Result, SessionState, Training, WorkoutMode } from "./types.js";

export type ValidationCode = SetValidationCode | "OutOfOrderSet" | "SetOutOfRange" | "UnknownExercise";

export type ValidationError = {
  kind: "validation";
  code: ValidationCode;
  exerciseId: string;
  setIndex: number;
};

export type StoreError = { kind: "store"; message: string };

/** One outstanding slot reported by the completion check. */
export type SetIssue = {
  exerciseId: string;
  exerciseName: string;
  setIndex: number;
  code: SetValidationCode;
};

export type IncompleteError = { kind: "incomplete"; issues: SetIssue[] };

export type SessionError = ValidationError | StoreError | IncompleteError;
export type SessionResult = Result<Training, SessionError>;

export type SessionDeps = {
  trainings: TrainingStore;
  history: HistoryStore;
  now?: () => Date;
};

export type WriteOptions = { defer?: boolean };

function cloneTraining(training: Training): Training {
  return {
    ...training,
    exercises: training.exercises.map((ex) => ({ ...ex, actualSets: [...ex.actualSets] })),
  };
}

function replaceSets(training: Training, exerciseId: string, sets: ActualSet[]): Training {
  return {
    ...training,
    exercises: training.exercises.map((ex) => (ex.id === exerciseId ? { ...ex, actualSets: sets } : ex)),
  };
}

/**
 * Completion check over raw bulk fields; slots with no row count as empty.
 * Exercises without a key in `entries` are left to the stored-set check.
 */
export function findEntryIssues(training: Training, entries: BulkEntries): SetIssue[] {
  const issues: SetIssue[] = [];
  for (const ex of training.exercises) {
    if (!(ex.id in entries)) continue;
    const rows = entries[ex.id] ?? [];
    for (let i = 0; i < ex.sets; i++) {
      const row = rows[i];
      const result = validateSet(row?.reps ?? "", row?.weight ?? "");
      if (!result.ok) issues.push({ exerciseId: ex.id, exerciseName: ex.name, setIndex: i, code: result.error });
    }
  }
  return issues;
}

/** Completion check over stored sets. Stored values are re-validated, not trusted. */
export function findStoredIssues(training: Training): SetIssue[] {
  const issues: SetIssue[] = [];
  for (const ex of training.exercises) {
    for (let i = 0; i < ex.sets; i++) {
      const set = ex.actualSets[i];
      if (!set) {
        issues.push({ exerciseId: ex.id, exerciseName: ex.name, setIndex: i, code: "EmptyField" });
      } else if (!isValidActualSet(set)) {
        const code: SetValidationCode =
          Number.isSafeInteger(set.reps) && set.reps > 0 ? "InvalidWeight" : "InvalidReps";
        issues.push({ exerciseId: ex.id, exerciseName: ex.name, setIndex: i, code });
      }
    }
  }
  return issues;
}

function enteredSets(exercise: Exercise, entries: BulkEntries): ActualSet[] {
  const rows = (entries[exercise.id] ?? []).slice(0, exercise.sets);
  const sets: ActualSet[] = [];
  for (const row of rows) {
    const set = readEnteredSet(row.reps, row.weight);
    if (set) sets.push(set);
  }
  return sets;
}

export class SessionController {
  private current: Training;
  private dirty = false;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly now: () => Date;

  constructor(training: Training, private readonly deps: SessionDeps) {
    this.current = cloneTraining(training);
    this.now = deps.now ?? (() => new Date());
  }

  get training(): Training {
    return this.current;
  }

  get state(): SessionState {
    return sessionState(this.current);
  }

  /** True when edits were applied with `defer` and not written yet. */
  get hasUnsavedChanges(): boolean {
    return this.dirty;
  }

  mode(preferred?: WorkoutMode | null): WorkoutMode {
    return resolveMode(this.current, preferred);
  }

  recordSet(
    exerciseId: string,
    setIndex: number,
    repsText: string,
    weightText: string,
    options: WriteOptions = {}
  ): Promise<SessionResult> {
    return this.enqueue(async () => {
      const exercise = this.current.exercises.find((ex) => ex.id === exerciseId);
      const fail = (code: ValidationCode): SessionResult => ({
        ok: false,
        error: { kind: "validation", code, exerciseId, setIndex },
      });
      if (!exercise) return fail("UnknownExercise");
      if (!Number.isInteger(setIndex) || setIndex < 0 || setIndex >= exercise.sets) return fail("SetOutOfRange");
      // no gaps: a set can only replace an existing one or be the next one
      if (setIndex > exercise.actualSets.length) return fail("OutOfOrderSet");

      const validated = validateSet(repsText, weightText);
      if (!validated.ok) return fail(validated.error);

      const sets = [...exercise.actualSets];
      sets[setIndex] = validated.value;
      return this.apply(replaceSets(this.current, exerciseId, sets), options);
    });
  }

  /**
   * Bulk autosave: each exercise's sets become the fully entered rows, in order.
   * On a completed training the entries are checked strictly, since it must
   * stay fully logged.
   */
  applyBulkEntries(entries: BulkEntries, options: WriteOptions = {}): Promise<SessionResult> {
    return this.enqueue(async () => {
      if (this.current.isCompleted) {
        const issues = findEntryIssues(this.current, entries);
        if (issues.length) return { ok: false, error: { kind: "incomplete", issues } };
      }
      let next = this.current;
      for (const ex of this.current.exercises) {
        if (!(ex.id in entries)) continue;
        next = replaceSets(next, ex.id, enteredSets(ex, entries));
      }
      return this.apply(next, options);
    });
  }

  /**
   * Marks the training completed when every target set is present and valid.
   * With `entries` the raw bulk fields are checked; without, the stored sets.
   * All outstanding slots are reported at once.
   */
  complete(entries?: BulkEntries): Promise<SessionResult> {
    return this.enqueue(async () => {
      let candidate = this.current;
      if (entries) {
        const issues = findEntryIssues(candidate, entries);
        if (issues.length) return { ok: false, error: { kind: "incomplete", issues } };
        for (const ex of candidate.exercises) {
          if (!(ex.id in entries)) continue;
          candidate = replaceSets(candidate, ex.id, enteredSets(ex, entries));
        }
      }
      const issues = findStoredIssues(candidate);
      if (issues.length) return { ok: false, error: { kind: "incomplete", issues } };

      const completed: Training = {
        ...candidate,
        isCompleted: true,
        completedAt: this.now().toISOString(),
      };
      const saved = await this.persist(completed);
      if (!saved.ok) return saved;

      try {
        await this.deps.history.save(saved.value);
      } catch (err) {
        console.error(`session: history save failed for training ${saved.value.id}:`, describeError(err));
      }
      return saved;
    });
  }

  saveAndExit(): Promise<SessionResult> {
    return this.enqueue(() => this.persist(this.current));
  }

  private async apply(next: Training, options: WriteOptions): Promise<SessionResult> {
    const stamped = next.isCompleted ? { ...next, completedAt: this.now().toISOString() } : next;
    if (options.defer) {
      this.current = stamped;
      this.dirty = true;
      return { ok: true, value: stamped };
    }
    return this.persist(stamped);
  }

  private async persist(next: Training): Promise<SessionResult> {
    try {
      const saved = await this.deps.trainings.upsert(next);
      this.current = cloneTraining(saved);
      this.dirty = false;
      return { ok: true, value: this.current };
    } catch (err) {
      // keep the last good state; the caller decides whether to retry
      console.error(`session: store write failed for training ${next.id}:`, describeError(err));
      return { ok: false, error: { kind: "store", message: describeError(err) } };
    }
  }

  private enqueue<T>(op: () => Promise<T>): Promise<T> {
    const run = this.queue.then(op, op);
    this.queue = run.catch(() => undefined);
    return run;
  }
}
