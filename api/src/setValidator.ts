// setValidator.ts
// Validation of a single reps × weight entry as typed by the trainee.

import type { ActualSet, Result } from "./types.js";

export type SetValidationCode = "EmptyField" | "InvalidReps" | "InvalidWeight";

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseReps(text: string): number | null {
  if (!INTEGER.test(text)) return null;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
}

function parseWeight(text: string): number | null {
  if (!DECIMAL.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * Strict reading used by set submission and the completion check.
 * Both fields must be present: reps an integer > 0, weight a number ≥ 0.
 */
export function validateSet(repsText: string, weightText: string): Result<ActualSet, SetValidationCode> {
  const repsRaw = repsText.trim();
  const weightRaw = weightText.trim();
  if (!repsRaw || !weightRaw) return { ok: false, error: "EmptyField" };

  const reps = parseReps(repsRaw);
  if (reps === null || reps <= 0) return { ok: false, error: "InvalidReps" };

  const weight = parseWeight(weightRaw);
  if (weight === null || weight < 0) return { ok: false, error: "InvalidWeight" };

  // -0 parses as a valid weight; store it as 0
  return { ok: true, value: { reps, weight: weight === 0 ? 0 : weight } };
}

/**
 * Lenient reading used while sets are still being typed in:
 * anything short of a valid pair is "not entered yet".
 */
export function readEnteredSet(repsText: string, weightText: string): ActualSet | null {
  const result = validateSet(repsText, weightText);
  return result.ok ? result.value : null;
}

export function isValidActualSet(set: ActualSet): boolean {
  return (
    Number.isSafeInteger(set.reps) &&
    set.reps > 0 &&
    Number.isFinite(set.weight) &&
    set.weight >= 0
  );
}
