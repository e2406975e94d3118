import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  elapsedMs,
  finishSession,
  fromSessionSnapshot,
  isSessionCompleted,
  pauseSession,
  progressPercentage,
  resumeSession,
  sessionState,
  setStepCompletion,
  startSession,
  toSessionSnapshot,
} from "../src/pipeline/session";

const startedAt = new Date("2026-01-01T12:00:00.000Z");
const minutesLater = (minutes: number) => new Date(startedAt.getTime() + minutes * 60_000);

describe("cooking session", () => {
  it("starts with every step open", () => {
    const session = startSession("42", 4, startedAt);

    assert.deepEqual(session.stepCompletions, [false, false, false, false]);
    assert.equal(session.startTime, startedAt);
    assert.equal(session.endTime, undefined);
    assert.equal(session.isPaused, false);
    assert.equal(progressPercentage(session), 0);
    assert.equal(sessionState(session), "active");
  });

  it("tracks progress without mutating earlier snapshots", () => {
    const started = startSession("42", 4, startedAt);
    const session = setStepCompletion(setStepCompletion(started, 0, true), 2, true);

    assert.equal(progressPercentage(session), 0.5);
    assert.equal(isSessionCompleted(session), false);
    assert.deepEqual(started.stepCompletions, [false, false, false, false]);
    assert.deepEqual(setStepCompletion(session, 0, false).stepCompletions, [false, false, true, false]);
  });

  it("ignores indices outside the step list", () => {
    const session = startSession("42", 2, startedAt);

    assert.equal(setStepCompletion(session, 2, true), session);
    assert.equal(setStepCompletion(session, -1, true), session);
  });

  it("is completed once every step is done", () => {
    let session = startSession("42", 3, startedAt);
    for (const index of [0, 1, 2]) {
      session = setStepCompletion(session, index, true);
    }

    assert.equal(progressPercentage(session), 1);
    assert.equal(isSessionCompleted(session), true);
    assert.equal(sessionState(session), "completed");
  });

  it("pauses and resumes without touching completions", () => {
    const session = setStepCompletion(startSession("42", 2, startedAt), 1, true);
    const paused = pauseSession(session);

    assert.equal(paused.isPaused, true);
    assert.equal(sessionState(paused), "paused");
    assert.deepEqual(paused.stepCompletions, [false, true]);

    const resumed = resumeSession(paused);
    assert.equal(resumed.isPaused, false);
    assert.deepEqual(resumed.stepCompletions, [false, true]);
  });

  it("measures elapsed time until the session finishes", () => {
    const session = startSession("42", 2, startedAt);

    assert.equal(elapsedMs(session, minutesLater(1.5)), 90_000);
    assert.equal(elapsedMs(session, minutesLater(3)), 180_000);
    assert.equal(elapsedMs(session, minutesLater(-1)), 0);

    const finished = finishSession(session, minutesLater(30));
    assert.equal(sessionState(finished), "ended");
    assert.equal(elapsedMs(finished, minutesLater(45)), 1_800_000);
  });

  it("keeps the first end time when finished twice", () => {
    const finished = finishSession(startSession("42", 2, startedAt), minutesLater(30));
    const again = finishSession(finished, minutesLater(40));

    assert.equal(again, finished);
    assert.deepEqual(again.endTime, minutesLater(30));
  });

  it("treats a session without steps as completed", () => {
    const session = startSession("42", 0, startedAt);

    assert.equal(progressPercentage(session), 0);
    assert.equal(isSessionCompleted(session), true);
  });

  it("clamps step counts to whole non-negative numbers", () => {
    assert.equal(startSession("42", -3, startedAt).stepCompletions.length, 0);
    assert.equal(startSession("42", 2.7, startedAt).stepCompletions.length, 2);
  });

  describe("snapshots", () => {
    it("serializes and restores a finished session", () => {
      let session = startSession("42", 4, startedAt);
      session = setStepCompletion(setStepCompletion(session, 0, true), 2, true);
      session = finishSession(session, minutesLater(30));

      const snapshot = toSessionSnapshot(session);

      assert.deepEqual(snapshot, {
        recipe_id: "42",
        step_completions: [true, false, true, false],
        start_time: "2026-01-01T12:00:00.000Z",
        end_time: "2026-01-01T12:30:00.000Z",
        is_paused: false,
      });
      assert.deepEqual(fromSessionSnapshot(JSON.parse(JSON.stringify(snapshot))), session);
    });

    it("restores an open session with defaults for optional fields", () => {
      const restored = fromSessionSnapshot({
        recipe_id: "7",
        step_completions: [true],
        start_time: "2026-01-01T12:00:00.000Z",
        end_time: null,
      });

      assert.deepEqual(restored, {
        recipeId: "7",
        stepCompletions: [true],
        startTime: startedAt,
        isPaused: false,
      });
    });

    it("rejects snapshots with the wrong shape", () => {
      assert.equal(fromSessionSnapshot({ recipe_id: 1 }), null);
      assert.equal(
        fromSessionSnapshot({ recipe_id: "7", step_completions: [true, "no"], start_time: "2026-01-01" }),
        null,
      );
      assert.equal(
        fromSessionSnapshot({ recipe_id: "7", step_completions: [], start_time: "yesterday" }),
        null,
      );
    });
  });
});
