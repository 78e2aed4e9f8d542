import type { Exercise, HistoryRecord, Training } from "../types.js";

export function makeExercise(overrides: Partial<Exercise> = {}): Exercise {
  return {
    id: "ex-1",
    name: "Bench Press",
    sets: 3,
    reps: 8,
    weight: 60,
    instructions: "",
    actualSets: [],
    ...overrides,
  };
}

export function makeTraining(overrides: Partial<Training> = {}): Training {
  return {
    id: "t-1",
    traineeId: "trainee-1",
    name: "Upper A",
    description: "",
    difficulty: "intermediate",
    scheduledDate: "2024-06-12",
    exercises: [makeExercise()],
    notes: null,
    isCompleted: false,
    completedAt: null,
    ...overrides,
  };
}

export function makeHistory(overrides: Partial<HistoryRecord> = {}): HistoryRecord {
  return {
    id: "h-1",
    traineeId: "trainee-1",
    trainingId: "t-0",
    exerciseName: "Bench Press",
    date: "2024-06-05",
    completedAt: "2024-06-05T10:00:00.000Z",
    actualSets: [
      { reps: 8, weight: 57.5 },
      { reps: 8, weight: 57.5 },
      { reps: 7, weight: 57.5 },
    ],
    ...overrides,
  };
}
