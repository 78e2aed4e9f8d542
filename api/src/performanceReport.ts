// performanceReport.ts
// Per-exercise statistics over history and the "compared with last time"
// report shown after a workout is completed.

import type { ActualSet, HistoryRecord, Training } from "./types.js";

export function maxWeight(sets: ActualSet[]): number {
  return sets.reduce((max, s) => (s.weight > max ? s.weight : max), 0);
}

export function maxReps(sets: ActualSet[]): number {
  return sets.reduce((max, s) => (s.reps > max ? s.reps : max), 0);
}

export function totalVolume(sets: ActualSet[]): number {
  return sets.reduce((sum, s) => sum + s.weight * s.reps, 0);
}

export type ExerciseStats = {
  totalSessions: number;
  maxWeight: number;
  maxReps: number;
  averageVolume: number;
  lastPerformed: string | null;
  firstPerformed: string | null;
};

/** `records` newest first, as the history store returns them. */
export function exerciseStats(records: HistoryRecord[]): ExerciseStats {
  if (records.length === 0) {
    return {
      totalSessions: 0,
      maxWeight: 0,
      maxReps: 0,
      averageVolume: 0,
      lastPerformed: null,
      firstPerformed: null,
    };
  }
  const volumes = records.map((r) => totalVolume(r.actualSets));
  return {
    totalSessions: records.length,
    maxWeight: Math.max(...records.map((r) => maxWeight(r.actualSets))),
    maxReps: Math.max(...records.map((r) => maxReps(r.actualSets))),
    averageVolume: volumes.reduce((a, b) => a + b, 0) / records.length,
    lastPerformed: records[0].completedAt,
    firstPerformed: records[records.length - 1].completedAt,
  };
}

export type ExerciseComparison = {
  exerciseName: string;
  previous: HistoryRecord | null;
  current: ActualSet[];
  weightProgress: number;
  repsProgress: number;
  volumeProgress: number;
  weightProgressPercentage: number;
  hasImproved: boolean;
  description: string;
};

export function compareExercise(
  exerciseName: string,
  current: ActualSet[],
  previous: HistoryRecord | null
): ExerciseComparison {
  const comparable = previous !== null && current.length > 0;
  const weightProgress = comparable ? maxWeight(current) - maxWeight(previous.actualSets) : 0;
  const repsProgress = comparable ? maxReps(current) - maxReps(previous.actualSets) : 0;
  const volumeProgress = comparable ? totalVolume(current) - totalVolume(previous.actualSets) : 0;
  const previousMax = previous ? maxWeight(previous.actualSets) : 0;
  const weightProgressPercentage =
    comparable && previousMax > 0 ? (weightProgress / previousMax) * 100 : 0;

  return {
    exerciseName,
    previous,
    current,
    weightProgress,
    repsProgress,
    volumeProgress,
    weightProgressPercentage,
    hasImproved: weightProgress > 0 || repsProgress > 0 || volumeProgress > 0,
    description: describeProgress(previous, weightProgress, repsProgress),
  };
}

function describeProgress(previous: HistoryRecord | null, weight: number, reps: number): string {
  if (!previous) return "First time doing this exercise";
  const parts: string[] = [];
  if (weight > 0) parts.push(`${weight.toFixed(1)}kg weight increase`);
  else if (weight < 0) parts.push(`${(-weight).toFixed(1)}kg weight decrease`);
  if (reps > 0) parts.push(`${reps} more reps`);
  else if (reps < 0) parts.push(`${-reps} fewer reps`);
  return parts.length ? parts.join(", ") : "Performance maintained";
}

export type ProgressReport = {
  trainingId: string;
  trainingName: string;
  traineeId: string;
  completedAt: string | null;
  comparisons: ExerciseComparison[];
  exercisesWithImprovement: number;
  improvementPercentage: number;
  totalVolumeIncrease: number;
  summary: string;
};

/**
 * `previousByName` must already exclude records written by this training,
 * otherwise a workout would be compared against itself.
 */
export function buildProgressReport(
  training: Training,
  previousByName: Map<string, HistoryRecord | null>
): ProgressReport {
  const comparisons = training.exercises
    .filter((ex) => ex.actualSets.length > 0)
    .map((ex) => compareExercise(ex.name, ex.actualSets, previousByName.get(ex.name) ?? null));

  const improved = comparisons.filter((c) => c.hasImproved).length;
  const total = comparisons.length;
  let summary: string;
  if (improved === 0) summary = "Performance maintained across all exercises";
  else if (improved === total) summary = "Improvement in all exercises!";
  else summary = `Improvement in ${improved} out of ${total} exercises`;

  return {
    trainingId: training.id,
    trainingName: training.name,
    traineeId: training.traineeId,
    completedAt: training.completedAt ?? null,
    comparisons,
    exercisesWithImprovement: improved,
    improvementPercentage: total > 0 ? (improved / total) * 100 : 0,
    totalVolumeIncrease: comparisons.reduce((sum, c) => sum + c.volumeProgress, 0),
    summary,
  };
}
