import { buildProgressReport, compareExercise, exerciseStats, totalVolume } from "./performanceReport.js";
import { makeExercise, makeHistory, makeTraining } from "./testUtils/fixtures.js";

describe("exerciseStats", () => {
  it("is empty without history", () => {
    expect(exerciseStats([])).toEqual({
      totalSessions: 0,
      maxWeight: 0,
      maxReps: 0,
      averageVolume: 0,
      lastPerformed: null,
      firstPerformed: null,
    });
  });

  it("summarises records given newest first", () => {
    const newest = makeHistory({
      id: "b",
      completedAt: "2024-06-10T10:00:00.000Z",
      actualSets: [{ reps: 5, weight: 80 }],
    });
    const oldest = makeHistory({
      id: "a",
      completedAt: "2024-06-03T10:00:00.000Z",
      actualSets: [
        { reps: 10, weight: 60 },
        { reps: 10, weight: 60 },
      ],
    });
    expect(exerciseStats([newest, oldest])).toEqual({
      totalSessions: 2,
      maxWeight: 80,
      maxReps: 10,
      averageVolume: 800,
      lastPerformed: "2024-06-10T10:00:00.000Z",
      firstPerformed: "2024-06-03T10:00:00.000Z",
    });
  });
});

describe("compareExercise", () => {
  it("describes a first attempt", () => {
    const c = compareExercise("Bench Press", [{ reps: 8, weight: 60 }], null);
    expect(c.description).toBe("First time doing this exercise");
    expect(c.hasImproved).toBe(false);
  });

  it("describes weight and rep changes against last time", () => {
    const previous = makeHistory({ actualSets: [{ reps: 10, weight: 57.5 }] });
    const c = compareExercise("Bench Press", [{ reps: 8, weight: 60 }], previous);
    expect(c.weightProgress).toBe(2.5);
    expect(c.repsProgress).toBe(-2);
    expect(c.description).toBe("2.5kg weight increase, 2 fewer reps");
    expect(c.volumeProgress).toBe(480 - 575);
    expect(c.hasImproved).toBe(true);
  });

  it("reports maintained performance", () => {
    const previous = makeHistory({ actualSets: [{ reps: 8, weight: 60 }] });
    const c = compareExercise("Bench Press", [{ reps: 8, weight: 60 }], previous);
    expect(c.description).toBe("Performance maintained");
    expect(c.hasImproved).toBe(false);
  });
});

describe("buildProgressReport", () => {
  const squatSets = [{ reps: 5, weight: 100 }];

  it("summarises partial improvement", () => {
    const training = makeTraining({
      isCompleted: true,
      completedAt: "2024-06-12T10:00:00.000Z",
      exercises: [
        makeExercise({ sets: 1, actualSets: [{ reps: 8, weight: 60 }] }),
        makeExercise({ id: "ex-2", name: "Squat", sets: 1, actualSets: squatSets }),
        makeExercise({ id: "ex-3", name: "Plank", sets: 1 }),
      ],
    });
    const report = buildProgressReport(
      training,
      new Map([
        ["Bench Press", makeHistory({ actualSets: [{ reps: 8, weight: 55 }] })],
        ["Squat", makeHistory({ exerciseName: "Squat", actualSets: squatSets })],
      ])
    );
    expect(report.comparisons.map((c) => c.exerciseName)).toEqual(["Bench Press", "Squat"]);
    expect(report.exercisesWithImprovement).toBe(1);
    expect(report.improvementPercentage).toBe(50);
    expect(report.totalVolumeIncrease).toBe(40);
    expect(report.summary).toBe("Improvement in 1 out of 2 exercises");
  });

  it("uses the all-improved and none-improved summaries", () => {
    const training = makeTraining({
      exercises: [makeExercise({ sets: 1, actualSets: [{ reps: 9, weight: 60 }] })],
    });
    const better = buildProgressReport(training, new Map([["Bench Press", makeHistory({ actualSets: [{ reps: 8, weight: 60 }] })]]));
    expect(better.summary).toBe("Improvement in all exercises!");
    const first = buildProgressReport(training, new Map());
    expect(first.summary).toBe("Performance maintained across all exercises");
  });

  it("computes volume as weight times reps", () => {
    expect(totalVolume([{ reps: 5, weight: 100 }, { reps: 3, weight: 0 }])).toBe(500);
  });
});
