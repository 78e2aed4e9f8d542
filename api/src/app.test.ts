import type { Server } from "node:http";
import jwt from "jsonwebtoken";
import { createApp } from "./app.js";
import { makeExercise, makeHistory, makeTraining } from "./testUtils/fixtures.js";
import { createMemoryStores } from "./testUtils/memoryStores.js";
import type { MemoryStores } from "./testUtils/memoryStores.js";

const SECRET = "test-secret";
const TOKEN = jwt.sign({ uid: "trainee-1" }, SECRET);
// Wednesday 12 June 2024, local time
const NOW = new Date(2024, 5, 12, 10, 0);
const TODAY = "2024-06-12";

type Reply = { status: number; body: unknown };

describe("HTTP API", () => {
  let stores: MemoryStores;
  let server: Server;
  let base: string;

  async function call(method: string, path: string, body?: unknown, token: string | null = TOKEN): Promise<Reply> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (token) headers.authorization = `Bearer ${token}`;
    const res = await fetch(base + path, {
      method,
      headers,
      body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  beforeAll(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  beforeEach(async () => {
    stores = createMemoryStores();
    stores.trainings.seed(
      makeTraining({
        exercises: [
          makeExercise({ id: "ex-1", name: "Bench Press", sets: 3, weight: 60 }),
          makeExercise({ id: "ex-2", name: "Row", sets: 2, weight: 50 }),
        ],
      }),
      makeTraining({ id: "t-other", traineeId: "trainee-2" })
    );
    stores.history.seed(makeHistory());

    const app = createApp({ stores, jwtSecret: SECRET, now: () => NOW });
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, () => resolve(s));
    });
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  describe("auth", () => {
    it("serves /health without a token", async () => {
      expect(await call("GET", "/health", undefined, null)).toEqual({ status: 200, body: { ok: true } });
    });

    it("rejects missing and foreign tokens", async () => {
      expect(await call("GET", "/trainings", undefined, null)).toEqual({
        status: 401,
        body: { error: "No authentication token provided" },
      });
      const forged = jwt.sign({ uid: "trainee-1" }, "other-secret");
      expect(await call("GET", "/trainings", undefined, forged)).toEqual({
        status: 401,
        body: { error: "Invalid token" },
      });
      const noUid = jwt.sign({ sub: "trainee-1" }, SECRET);
      expect((await call("GET", "/trainings", undefined, noUid)).status).toBe(401);
    });
  });

  describe("trainings", () => {
    it("lists only the caller's trainings with derived state", async () => {
      const { status, body } = await call("GET", "/trainings");
      expect(status).toBe(200);
      expect(body).toMatchObject({
        trainings: [
          {
            id: "t-1",
            state: "not_started",
            mode: "normal",
            progress: { completedSets: 0, totalSets: 5, label: "0/5 sets", percentLabel: "0%" },
          },
        ],
      });
    });

    it("prefills the bulk grid from the last performance", async () => {
      const { status, body } = await call("GET", "/trainings/t-1");
      expect(status).toBe(200);
      expect(body).toMatchObject({
        state: "not_started",
        resume: { exerciseIndex: 0, setIndex: 0, finished: false },
        exercises: [
          { id: "ex-1", lastPerformance: { id: "h-1" } },
          { id: "ex-2", lastPerformance: null },
        ],
        bulkEntries: {
          "ex-1": [
            { reps: "8", weight: "57.5" },
            { reps: "8", weight: "57.5" },
            { reps: "7", weight: "57.5" },
          ],
          "ex-2": [
            { reps: "", weight: "50" },
            { reps: "", weight: "50" },
          ],
        },
      });
    });

    it("answers 404 for another trainee's training", async () => {
      expect(await call("GET", "/trainings/t-other")).toEqual({
        status: 404,
        body: { error: "Training not found", code: "training_not_found" },
      });
    });

    it("records a set and switches to per-set mode", async () => {
      const { status, body } = await call("POST", "/trainings/t-1/sets", {
        exerciseId: "ex-1",
        setIndex: 0,
        reps: "8",
        weight: 60,
      });
      expect(status).toBe(200);
      expect(body).toMatchObject({ state: "in_progress", mode: "normal", progress: { label: "1/5 sets" } });
      expect(stores.trainings.get("t-1")?.exercises[0].actualSets).toEqual([{ reps: 8, weight: 60 }]);
    });

    it("returns set validation failures as 400", async () => {
      await call("POST", "/trainings/t-1/sets", { exerciseId: "ex-1", setIndex: 0, reps: "8", weight: "60" });
      const reply = await call("POST", "/trainings/t-1/sets", {
        exerciseId: "ex-1",
        setIndex: 1,
        reps: "abc",
        weight: "60",
      });
      expect(reply).toEqual({
        status: 400,
        body: {
          error: "invalid_set",
          code: "InvalidReps",
          details: { kind: "validation", code: "InvalidReps", exerciseId: "ex-1", setIndex: 1 },
        },
      });
    });

    it("rejects a malformed request body", async () => {
      const reply = await call("POST", "/trainings/t-1/sets", { exerciseId: "ex-1", reps: "8", weight: "60" });
      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({ code: "bad_request" });
      expect(await call("POST", "/trainings/t-1/sets", "{")).toEqual({
        status: 400,
        body: { error: "Malformed JSON body" },
      });
    });

    it("lists every outstanding set when completion is refused", async () => {
      await call("POST", "/trainings/t-1/sets", { exerciseId: "ex-1", setIndex: 0, reps: "8", weight: "60" });
      const reply = await call("POST", "/trainings/t-1/complete", {});
      expect(reply).toEqual({
        status: 422,
        body: {
          error: "incomplete_workout",
          issues: [
            { exerciseId: "ex-1", exerciseName: "Bench Press", setIndex: 1, code: "EmptyField" },
            { exerciseId: "ex-1", exerciseName: "Bench Press", setIndex: 2, code: "EmptyField" },
            { exerciseId: "ex-2", exerciseName: "Row", setIndex: 0, code: "EmptyField" },
            { exerciseId: "ex-2", exerciseName: "Row", setIndex: 1, code: "EmptyField" },
          ],
        },
      });
      expect(stores.trainings.get("t-1")?.isCompleted).toBe(false);
    });

    it("completes from bulk entries and reports against last time", async () => {
      const bench = { reps: "8", weight: "60" };
      const row = { reps: 10, weight: 50 };
      const done = await call("POST", "/trainings/t-1/complete", {
        entries: { "ex-1": [bench, bench, bench], "ex-2": [row, row] },
      });
      expect(done.status).toBe(200);
      expect(done.body).toMatchObject({
        state: "completed",
        mode: "normal",
        training: { isCompleted: true, completedAt: NOW.toISOString() },
      });
      expect(stores.history.records.map((r) => r.exerciseName)).toEqual(["Bench Press", "Bench Press", "Row"]);

      const report = await call("GET", "/trainings/t-1/report");
      expect(report.status).toBe(200);
      expect(report.body).toMatchObject({
        report: {
          trainingId: "t-1",
          exercisesWithImprovement: 1,
          summary: "Improvement in 1 out of 2 exercises",
          comparisons: [
            { exerciseName: "Bench Press", weightProgress: 2.5, description: "2.5kg weight increase" },
            { exerciseName: "Row", description: "First time doing this exercise" },
          ],
        },
      });
    });

    it("refuses a report for an unfinished training", async () => {
      expect((await call("GET", "/trainings/t-1/report")).status).toBe(409);
    });

    it("saves bulk progress without completing", async () => {
      const reply = await call("PUT", "/trainings/t-1/bulk", {
        entries: { "ex-2": [{ reps: "10", weight: "50" }, { reps: "", weight: "50" }] },
      });
      expect(reply.status).toBe(200);
      expect(reply.body).toMatchObject({ state: "in_progress", mode: "normal", progress: { label: "1/5 sets" } });
      expect((await call("POST", "/trainings/t-1/save")).status).toBe(200);
    });

    it("refuses a bulk save that would empty a completed training", async () => {
      const row = { reps: "8", weight: "60" };
      await call("POST", "/trainings/t-1/complete", { entries: { "ex-1": [row, row, row], "ex-2": [row, row] } });
      const reply = await call("PUT", "/trainings/t-1/bulk", { entries: { "ex-2": [row] } });
      expect(reply).toEqual({
        status: 422,
        body: {
          error: "incomplete_workout",
          issues: [{ exerciseId: "ex-2", exerciseName: "Row", setIndex: 1, code: "EmptyField" }],
        },
      });
      expect(stores.trainings.get("t-1")?.exercises[1].actualSets).toHaveLength(2);
    });

    it("maps a failing store to 503", async () => {
      stores.trainings.failWrites = true;
      const reply = await call("POST", "/trainings/t-1/sets", {
        exerciseId: "ex-1",
        setIndex: 0,
        reps: "8",
        weight: "60",
      });
      expect(reply).toEqual({ status: 503, body: { error: "store_unavailable", message: "store offline" } });
    });

    it("uses the stored mode preference for an untouched training", async () => {
      expect(await call("GET", "/settings/workout-mode")).toEqual({
        status: 200,
        body: { mode: "normal", isDefault: true },
      });
      expect((await call("PUT", "/settings/workout-mode", { mode: "bulk" })).body).toEqual({
        mode: "bulk",
        isDefault: false,
      });
      expect((await call("PUT", "/settings/workout-mode", { mode: "fast" })).status).toBe(400);
      expect((await call("GET", "/trainings")).body).toMatchObject({ trainings: [{ id: "t-1", mode: "bulk" }] });
    });
  });

  describe("history", () => {
    it("returns the last performance and stats for an exact name", async () => {
      const reply = await call("GET", "/history/Bench%20Press");
      expect(reply.status).toBe(200);
      expect(reply.body).toMatchObject({
        exerciseName: "Bench Press",
        lastPerformance: { id: "h-1" },
        stats: { totalSessions: 1, maxWeight: 57.5, maxReps: 8 },
      });
      expect((await call("GET", "/history/bench%20press")).body).toMatchObject({ lastPerformance: null });
      expect((await call("GET", "/history/Bench%20Press?limit=0")).status).toBe(400);
    });
  });

  describe("measurements", () => {
    it("keeps one measurement per day and labels the log", async () => {
      stores.measurements.seed({
        id: "m-seed",
        traineeId: "trainee-1",
        date: "2024-06-11",
        weight: 80.5,
        bodyMeasurements: {},
      });
      await call("PUT", "/measurements/today", { weight: 80 });
      const second = await call("PUT", "/measurements/today", { weight: 79.5, bodyMeasurements: { waist: 84 } });
      expect(second.body).toEqual({
        measurement: {
          id: "m-1",
          traineeId: "trainee-1",
          date: TODAY,
          weight: 79.5,
          bodyMeasurements: { waist: 84 },
        },
      });

      expect((await call("GET", "/measurements")).body).toEqual({
        measurements: [
          {
            id: "m-1",
            traineeId: "trainee-1",
            date: TODAY,
            weight: 79.5,
            bodyMeasurements: { waist: 84 },
            weightDelta: -1,
            dayLabel: "Today",
          },
          {
            id: "m-seed",
            traineeId: "trainee-1",
            date: "2024-06-11",
            weight: 80.5,
            bodyMeasurements: {},
            weightDelta: null,
            dayLabel: "Yesterday",
          },
        ],
      });

      expect((await call("GET", "/measurements/weekly")).body).toEqual({
        from: "2024-06-10",
        to: TODAY,
        weight: { average: 80, count: 2 },
        dimensions: { waist: { average: 84, count: 1 } },
      });
      expect((await call("GET", "/measurements/today")).body).toMatchObject({ measurement: { id: "m-1" } });
    });

    it("rejects a non-positive weight", async () => {
      expect((await call("PUT", "/measurements/today", { weight: 0 })).status).toBe(400);
    });
  });

  describe("steps", () => {
    it("prefers the manual entry over device sync", async () => {
      expect(await call("POST", "/steps/sync", { date: TODAY, steps: 3000 })).toEqual({
        status: 201,
        body: {
          date: TODAY,
          syncedSteps: 3000,
          entry: { traineeId: "trainee-1", date: TODAY, steps: 3000, origin: "device-sync" },
        },
      });
      expect((await call("GET", "/steps/today")).body).toEqual({
        entry: { traineeId: "trainee-1", date: TODAY, steps: 3000, origin: "device-sync" },
        weeklyAverage: { average: 3000, count: 1 },
      });

      await call("PUT", `/steps/${TODAY}`, { steps: 2500 });
      expect((await call("GET", "/steps/today")).body).toMatchObject({
        entry: { steps: 2500, origin: "manual" },
        weeklyAverage: { average: 2500, count: 1 },
      });

      const later = await call("POST", "/steps/sync", { date: TODAY, steps: 1000 });
      expect(later.body).toMatchObject({ syncedSteps: 4000, entry: { steps: 2500, origin: "manual" } });
      expect(stores.steps.rows).toEqual([{ traineeId: "trainee-1", date: TODAY, steps: 2500, origin: "manual" }]);
    });

    it("rejects future and malformed days", async () => {
      expect((await call("PUT", "/steps/2024-06-13", { steps: 100 })).status).toBe(400);
      expect((await call("PUT", "/steps/yesterday", { steps: 100 })).status).toBe(400);
    });
  });

  describe("nutrition", () => {
    it("logs foods and compares the day with the plan", async () => {
      stores.nutrition.plans.push({
        id: "p-1",
        traineeId: "trainee-1",
        name: "Cut",
        dailyCalories: 2000,
        macros: { protein: 150 },
      });
      const logged = await call("POST", `/nutrition/${TODAY}/foods`, {
        foods: [
          { name: "Oats", calories: 350 },
          { name: "Eggs", calories: 210 },
        ],
      });
      expect(logged.status).toBe(201);
      expect(logged.body).toMatchObject({ entry: { id: "n-1", date: TODAY, totalCalories: 560 } });

      expect((await call("GET", `/nutrition/${TODAY}`)).body).toMatchObject({
        date: TODAY,
        consumed: 560,
        delta: { remaining: 1440, isOver: false, magnitude: 1440 },
      });
    });

    it("rejects an empty food list and a bad date", async () => {
      expect((await call("POST", `/nutrition/${TODAY}/foods`, { foods: [] })).status).toBe(400);
      expect((await call("GET", "/nutrition/12-06-2024")).status).toBe(400);
    });
  });

  describe("progress summary", () => {
    it("combines goals, completions, steps and calories", async () => {
      stores.goals.seed({
        id: "g-1",
        traineeId: "trainee-1",
        type: "weight",
        name: "Reach 80kg",
        currentValue: 60,
        targetValue: 80,
        unit: "kg",
        deadline: "2024-09-01",
        isCompleted: false,
      });
      stores.trainings.seed(
        makeTraining({ id: "t-done", isCompleted: true, completedAt: NOW.toISOString() })
      );

      const { status, body } = await call("GET", "/progress/summary");
      expect(status).toBe(200);
      expect(body).toMatchObject({
        today: TODAY,
        goals: [{ id: "g-1", percentage: 75, percentLabel: "75%" }],
        workouts: { completedTotal: 1, completedThisWeek: 1, pending: 1 },
        steps: { today: { steps: 0, origin: "device-sync" }, weeklyAverage: { average: 0, count: 1 } },
        calories: { consumed: 0, target: null, delta: null },
      });
    });
  });

  it("answers 404 for unknown paths", async () => {
    expect(await call("GET", "/nope", undefined, null)).toEqual({ status: 404, body: { error: "Not found" } });
  });
});
