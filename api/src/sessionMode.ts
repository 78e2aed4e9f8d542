// sessionMode.ts
// The logging mode of a training is never stored. It is re-derived from the
// logged sets every time, so a rebuilt view always agrees with the data.

import type { Exercise, SessionState, Training, WorkoutMode } from "./types.js";

export const DEFAULT_WORKOUT_MODE: WorkoutMode = "normal";

function isPartial(exercise: Exercise): boolean {
  const logged = exercise.actualSets.length;
  return logged > 0 && logged < exercise.sets;
}

export function resolveMode(training: Training, preferredMode?: WorkoutMode | null): WorkoutMode {
  // completed workouts are reviewed set by set
  if (training.isCompleted) return "normal";
  if (training.exercises.some(isPartial)) return "normal";
  if (training.exercises.some((ex) => ex.actualSets.length > 0)) return "bulk";
  return preferredMode ?? DEFAULT_WORKOUT_MODE;
}

export function sessionState(training: Training): SessionState {
  if (training.isCompleted) return "completed";
  if (training.exercises.some((ex) => ex.actualSets.length > 0)) return "in_progress";
  return "not_started";
}

export type ResumePoint = {
  exerciseIndex: number;
  setIndex: number;
  finished: boolean;
};

/**
 * Where a per-set session picks up again: right after the last logged set
 * of the last exercise that has any, rolling over to the next exercise once
 * that one is full.
 */
export function resumePoint(training: Training): ResumePoint {
  const { exercises } = training;
  if (training.isCompleted) {
    return { exerciseIndex: Math.max(0, exercises.length - 1), setIndex: 0, finished: true };
  }

  let exerciseIndex = -1;
  exercises.forEach((ex, i) => {
    if (ex.actualSets.length > 0) exerciseIndex = i;
  });
  if (exerciseIndex < 0) {
    return { exerciseIndex: 0, setIndex: 0, finished: exercises.length === 0 };
  }

  const current = exercises[exerciseIndex];
  const setIndex = current.actualSets.length;
  if (setIndex < current.sets) return { exerciseIndex, setIndex, finished: false };
  if (exerciseIndex < exercises.length - 1) {
    return { exerciseIndex: exerciseIndex + 1, setIndex: 0, finished: false };
  }
  return { exerciseIndex, setIndex, finished: true };
}
