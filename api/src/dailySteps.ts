import { describeError } from "./middleware/errorHandler.js";
import type { HealthSync, StepsStore } from "./stores.js";
import type { StepsEntry } from "./types.js";

// A manual entry for the day always wins over device sync.
export async function resolveTodaySteps(
  steps: StepsStore,
  health: HealthSync,
  traineeId: string,
  today: string
): Promise<StepsEntry> {
  const logged = await steps.getToday(traineeId, today);
  if (logged && logged.origin === "manual") return logged;

  let synced = 0;
  try {
    synced = await health.getTodaySteps(traineeId, today);
  } catch (err) {
    console.warn("steps: health sync unavailable:", describeError(err));
  }
  if (logged && logged.steps >= synced) return logged;
  return { traineeId, date: today, steps: Math.max(0, Math.trunc(synced)), origin: "device-sync" };
}
