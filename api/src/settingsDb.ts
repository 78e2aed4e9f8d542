import { q } from "./db.js";
import { WORKOUT_MODE_KEY } from "./stores.js";
import type { PreferenceStore } from "./stores.js";

export const settingsDb: PreferenceStore = {
  async getWorkoutMode(traineeId) {
    const [row] = await q<{ value: string }>(
      `SELECT value FROM user_settings WHERE trainee_id = $1 AND key = $2`,
      [traineeId, WORKOUT_MODE_KEY]
    );
    const value = row?.value;
    return value === "normal" || value === "bulk" ? value : null;
  },

  async setWorkoutMode(traineeId, mode) {
    await q(
      `INSERT INTO user_settings (trainee_id, key, value, updated_at)
       VALUES ($1, $2, $3, now())
       ON CONFLICT (trainee_id, key) DO UPDATE SET value = EXCLUDED.value, updated_at = now()`,
      [traineeId, WORKOUT_MODE_KEY, mode]
    );
  },
};
