import { resolveTodaySteps } from "./dailySteps.js";
import { MemoryHealthSync, MemoryStepsStore } from "./testUtils/memoryStores.js";

const TODAY = "2024-06-12";

describe("resolveTodaySteps", () => {
  let steps: MemoryStepsStore;
  let health: MemoryHealthSync;

  beforeEach(() => {
    steps = new MemoryStepsStore();
    health = new MemoryHealthSync();
  });

  it("uses the device total when nothing was logged", async () => {
    await health.recordSample("trainee-1", TODAY, 3000);
    await health.recordSample("trainee-1", TODAY, 1200);
    expect(await resolveTodaySteps(steps, health, "trainee-1", TODAY)).toEqual({
      traineeId: "trainee-1",
      date: TODAY,
      steps: 4200,
      origin: "device-sync",
    });
  });

  it("lets a manual entry win over a higher device count", async () => {
    await steps.logManual("trainee-1", TODAY, 5000);
    await health.recordSample("trainee-1", TODAY, 9000);
    const entry = await resolveTodaySteps(steps, health, "trainee-1", TODAY);
    expect(entry).toEqual({ traineeId: "trainee-1", date: TODAY, steps: 5000, origin: "manual" });
  });

  it("keeps a stored device entry unless the live count is higher", async () => {
    steps.seed({ traineeId: "trainee-1", date: TODAY, steps: 6000, origin: "device-sync" });
    await health.recordSample("trainee-1", TODAY, 4000);
    expect((await resolveTodaySteps(steps, health, "trainee-1", TODAY)).steps).toBe(6000);
    await health.recordSample("trainee-1", TODAY, 4000);
    expect((await resolveTodaySteps(steps, health, "trainee-1", TODAY)).steps).toBe(8000);
  });

  it("falls back to zero when health sync is unavailable", async () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    health.failReads = true;
    const entry = await resolveTodaySteps(steps, health, "trainee-1", TODAY);
    expect(entry).toEqual({ traineeId: "trainee-1", date: TODAY, steps: 0, origin: "device-sync" });
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
