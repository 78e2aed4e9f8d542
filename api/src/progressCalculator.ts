// progressCalculator.ts
// Derived progress figures. Everything here is synchronous over collections
// that are already loaded; nothing is stored.

import { BODY_DIMENSIONS } from "./types.js";
import type {
  BodyDimension,
  Exercise,
  Goal,
  Measurement,
  NutritionEntry,
  Training,
} from "./types.js";
import { isWithin, mondayOf, toISODate } from "./utils/dates.js";

export type SetProgress = {
  completedSets: number;
  totalSets: number;
  ratio: number;
  label: string;
  percentLabel: string;
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function percentLabel(percent: number): string {
  return `${Math.trunc(clamp(percent, 0, 100))}%`;
}

function setProgress(completedSets: number, totalSets: number): SetProgress {
  const ratio = totalSets > 0 ? completedSets / totalSets : 0;
  return {
    completedSets,
    totalSets,
    ratio,
    label: `${completedSets}/${totalSets} sets`,
    percentLabel: percentLabel(ratio * 100),
  };
}

export function exerciseProgress(exercise: Exercise): SetProgress {
  return setProgress(exercise.actualSets.length, exercise.sets);
}

export function trainingProgress(training: Training): SetProgress {
  let completed = 0;
  let total = 0;
  for (const ex of training.exercises) {
    completed += ex.actualSets.length;
    total += ex.sets;
  }
  return setProgress(completed, total);
}

// ---------------------------------------------------------------------------
// Goals

/** The goal-authoring system's progress formula: current / target. */
function derivedGoalProgress(goal: Goal): number {
  if (goal.targetValue === 0) return 0;
  return (goal.currentValue / goal.targetValue) * 100;
}

export function goalPercentage(goal: Goal): number {
  const raw = derivedGoalProgress(goal);
  return Number.isFinite(raw) ? clamp(raw, 0, 100) : 0;
}

export function goalPercentLabel(goal: Goal): string {
  return percentLabel(goalPercentage(goal));
}

// ---------------------------------------------------------------------------
// Weekly averages

export type DatedValue = { date: string; value: number };
export type Average = { average: number; count: number };

export function weekWindow(today: string): { from: string; to: string } {
  return { from: mondayOf(today), to: today };
}

/** Mean over [Monday of this week, today]; null when the window is empty. */
export function weeklyAverage(points: DatedValue[], today: string): Average | null {
  const { from, to } = weekWindow(today);
  const inWeek = points.filter((p) => isWithin(p.date, from, to) && Number.isFinite(p.value));
  if (inWeek.length === 0) return null;
  const sum = inWeek.reduce((acc, p) => acc + p.value, 0);
  return { average: sum / inWeek.length, count: inWeek.length };
}

export type WeeklyMeasurementAverages = {
  from: string;
  to: string;
  weight: Average | null;
  dimensions: Partial<Record<BodyDimension, Average>>;
};

export function weeklyMeasurementAverages(
  measurements: Measurement[],
  today: string
): WeeklyMeasurementAverages {
  const dimensions: Partial<Record<BodyDimension, Average>> = {};
  for (const key of BODY_DIMENSIONS) {
    const points: DatedValue[] = [];
    for (const m of measurements) {
      const value = m.bodyMeasurements[key];
      if (value !== undefined) points.push({ date: m.date, value });
    }
    const avg = weeklyAverage(points, today);
    if (avg) dimensions[key] = avg;
  }

  return {
    ...weekWindow(today),
    weight: weeklyAverage(
      measurements.map((m) => ({ date: m.date, value: m.weight })),
      today
    ),
    dimensions,
  };
}

// ---------------------------------------------------------------------------
// Calories

export type CalorieDelta = {
  remaining: number;
  isOver: boolean;
  magnitude: number;
};

export function calorieDelta(dailyTarget: number, consumedTotal: number): CalorieDelta {
  const remaining = dailyTarget - consumedTotal;
  return { remaining, isOver: consumedTotal > dailyTarget, magnitude: Math.abs(remaining) };
}

export function nutritionTotal(entry: NutritionEntry): number {
  return entry.foods.reduce((sum, food) => sum + food.calories, 0);
}

export function dailyCalories(entries: NutritionEntry[]): number {
  return entries.reduce((sum, entry) => sum + nutritionTotal(entry), 0);
}

// ---------------------------------------------------------------------------
// History tables

export type WithDelta<T> = { entry: T; delta: number | null };

/**
 * Sorts by date (not by arrival order) and attaches the change against the
 * chronologically previous entry. The first entry has no delta.
 */
export function withDeltas<T extends { date: string }>(
  entries: T[],
  valueOf: (entry: T) => number
): WithDelta<T>[] {
  const sorted = [...entries].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  return sorted.map((entry, i) => ({
    entry,
    delta: i === 0 ? null : valueOf(entry) - valueOf(sorted[i - 1]),
  }));
}

export type CompletionSummary = {
  completedTotal: number;
  completedThisWeek: number;
  pending: number;
};

export function completionSummary(trainings: Training[], today: string): CompletionSummary {
  const { from, to } = weekWindow(today);
  let completedTotal = 0;
  let completedThisWeek = 0;
  for (const t of trainings) {
    if (!t.isCompleted) continue;
    completedTotal++;
    const day = t.completedAt ? toISODate(new Date(t.completedAt)) : t.scheduledDate;
    if (isWithin(day, from, to)) completedThisWeek++;
  }
  return { completedTotal, completedThisWeek, pending: trainings.length - completedTotal };
}
