// Validation with zod
import { z } from "zod";
import { isISODate } from "./utils/dates.js";

export const IsoDateSchema = z.string().refine(isISODate, { message: "expected a YYYY-MM-DD date" });

export const WorkoutModeSchema = z.enum(["normal", "bulk"]);

export const ActualSetSchema = z.object({
  reps: z.number(),
  weight: z.number(),
});

export const ExerciseSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  sets: z.number().int().positive(),
  reps: z.number().int().positive(),
  weight: z.number().nonnegative().nullish(),
  instructions: z.string().default(""),
  restSeconds: z.number().int().nonnegative().optional(),
  actualSets: z.array(ActualSetSchema).default([]),
});

export const ExerciseListSchema = z.array(ExerciseSchema);

// ---- JSONB payloads read back from PostgreSQL

export const StoredSetsSchema = z.array(ActualSetSchema);

export const BodyMeasurementsSchema = z
  .object({
    waist: z.number().nonnegative().optional(),
    chest: z.number().nonnegative().optional(),
    arms: z.number().nonnegative().optional(),
    hips: z.number().nonnegative().optional(),
  })
  .strict();

export const FoodItemSchema = z.object({
  name: z.string().trim().min(1),
  calories: z.number().nonnegative(),
  quantity: z.number().nonnegative().nullish(),
  unit: z.string().nullish(),
});

export const MacrosSchema = z.record(z.number());

// ---- request bodies

const FieldText = z.union([z.string(), z.number()]).transform((value) => String(value));

export const RecordSetSchema = z.object({
  exerciseId: z.string().min(1),
  setIndex: z.number().int().nonnegative(),
  reps: FieldText,
  weight: FieldText,
});

export const BulkEntriesSchema = z.record(
  z.array(z.object({ reps: FieldText, weight: FieldText }))
);

export const BulkSaveSchema = z.object({
  entries: BulkEntriesSchema,
});

export const CompleteSchema = z.object({
  entries: BulkEntriesSchema.optional(),
});

export const WorkoutModeBodySchema = z.object({ mode: WorkoutModeSchema });

export const MeasurementBodySchema = z.object({
  weight: z.number().positive(),
  bodyMeasurements: BodyMeasurementsSchema.optional(),
});

export const ManualStepsSchema = z.object({
  steps: z.number().int().nonnegative(),
});

export const DeviceStepsSchema = z.object({
  date: IsoDateSchema,
  steps: z.number().int().nonnegative(),
});

export const LogFoodsSchema = z.object({
  foods: z.array(FoodItemSchema).min(1),
});

export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true; data: T } | { success: false; error: string } {
  const parsed = schema.safeParse(data);
  if (parsed.success) return { success: true, data: parsed.data };
  return {
    success: false,
    error: parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; "),
  };
}
