import { Request } from "express";

export interface AuthRequest extends Request {
  user?: { uid: string; iat?: number; exp?: number };
}

export type Difficulty = "beginner" | "intermediate" | "advanced";
export type WorkoutMode = "normal" | "bulk";
export type SessionState = "not_started" | "in_progress" | "completed";

/** One performed set. Index i in `Exercise.actualSets` is logical set i+1. */
export interface ActualSet {
  readonly reps: number;
  readonly weight: number;
}

export interface Exercise {
  id: string;
  name: string;
  sets: number;
  reps: number;
  weight?: number | null;
  instructions: string;
  restSeconds?: number;
  actualSets: ActualSet[];
}

export interface Training {
  id: string;
  traineeId: string;
  name: string;
  description: string;
  difficulty: Difficulty;
  scheduledDate: string; // YYYY-MM-DD
  exercises: Exercise[];
  notes?: string | null;
  isCompleted: boolean;
  completedAt?: string | null;
}

interface GoalBase {
  id: string;
  traineeId: string;
  name: string;
  currentValue: number;
  targetValue: number;
  unit: string;
  deadline: string;
  isCompleted: boolean;
}

export type Goal =
  | (GoalBase & { type: "weight" })
  | (GoalBase & { type: "measurement"; dimension?: BodyDimension | null })
  | (GoalBase & { type: "performance"; exerciseName?: string | null });

export type GoalType = Goal["type"];

export const BODY_DIMENSIONS = ["waist", "chest", "arms", "hips"] as const;
export type BodyDimension = (typeof BODY_DIMENSIONS)[number];
export type BodyMeasurements = Partial<Record<BodyDimension, number>>;

export interface Measurement {
  id: string;
  traineeId: string;
  date: string;
  weight: number;
  bodyMeasurements: BodyMeasurements;
}

export type StepsOrigin = "manual" | "device-sync";

export interface StepsEntry {
  traineeId: string;
  date: string;
  steps: number;
  origin: StepsOrigin;
}

export interface FoodItem {
  name: string;
  calories: number;
  quantity?: number | null;
  unit?: string | null;
}

export interface NutritionEntry {
  id: string;
  traineeId: string;
  date: string;
  foods: FoodItem[];
}

export interface NutritionPlan {
  id: string;
  traineeId: string;
  name: string;
  dailyCalories: number;
  macros: Record<string, number>;
}

export interface HistoryRecord {
  id: string;
  traineeId: string;
  trainingId: string;
  exerciseName: string;
  date: string;
  completedAt: string;
  actualSets: ActualSet[];
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
