// goalDb.ts
// Goals are authored by the trainer side; this service only reads them.

import { q } from "./db.js";
import type { GoalStore } from "./stores.js";
import type { BodyDimension, Goal } from "./types.js";
import { BODY_DIMENSIONS } from "./types.js";

type GoalRow = {
  id: string;
  trainee_id: string;
  goal_type: string;
  name: string;
  current_value: string;
  target_value: string;
  unit: string;
  deadline: string;
  is_completed: boolean;
  subject: string | null;
};

function toDimension(value: string | null): BodyDimension | null {
  return BODY_DIMENSIONS.find((d) => d === value) ?? null;
}

function mapGoal(row: GoalRow): Goal {
  const base = {
    id: row.id,
    traineeId: row.trainee_id,
    name: row.name,
    currentValue: Number(row.current_value),
    targetValue: Number(row.target_value),
    unit: row.unit,
    deadline: row.deadline,
    isCompleted: row.is_completed,
  };
  switch (row.goal_type) {
    case "measurement":
      return { ...base, type: "measurement", dimension: toDimension(row.subject) };
    case "performance":
      return { ...base, type: "performance", exerciseName: row.subject };
    default:
      return { ...base, type: "weight" };
  }
}

export const goalDb: GoalStore = {
  async getForTrainee(traineeId) {
    const rows = await q<GoalRow>(
      `SELECT id, trainee_id, goal_type, name, current_value, target_value, unit,
              to_char(deadline, 'YYYY-MM-DD') AS deadline, is_completed, subject
         FROM goals
        WHERE trainee_id = $1
        ORDER BY created_at DESC`,
      [traineeId]
    );
    return rows.map(mapGoal);
  },
};
