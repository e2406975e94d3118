import { isRecord } from "./decode";
import type { CookingSession, CookingSessionSnapshot, SessionState } from "./types";

function freezeSession(session: CookingSession): CookingSession {
  return Object.freeze({ ...session, stepCompletions: Object.freeze([...session.stepCompletions]) });
}

export function startSession(
  recipeId: string,
  stepCount: number,
  now: Date = new Date(),
): CookingSession {
  const count = Number.isFinite(stepCount) ? Math.max(0, Math.floor(stepCount)) : 0;
  return freezeSession({
    recipeId,
    stepCompletions: new Array<boolean>(count).fill(false),
    startTime: now,
    isPaused: false,
  });
}

export function setStepCompletion(
  session: CookingSession,
  index: number,
  completed: boolean,
): CookingSession {
  if (!Number.isInteger(index) || index < 0 || index >= session.stepCompletions.length) {
    return session;
  }
  const stepCompletions = session.stepCompletions.map((value, position) =>
    position === index ? completed : value,
  );
  return freezeSession({ ...session, stepCompletions });
}

export function pauseSession(session: CookingSession): CookingSession {
  return session.isPaused ? session : freezeSession({ ...session, isPaused: true });
}

export function resumeSession(session: CookingSession): CookingSession {
  return session.isPaused ? freezeSession({ ...session, isPaused: false }) : session;
}

/** Records the end time once; finishing an ended session leaves it as it was. */
export function finishSession(session: CookingSession, now: Date = new Date()): CookingSession {
  if (session.endTime) {
    return session;
  }
  return freezeSession({ ...session, endTime: now });
}

export function completedStepCount(session: CookingSession): number {
  return session.stepCompletions.filter((completed) => completed).length;
}

export function progressPercentage(session: CookingSession): number {
  const total = session.stepCompletions.length;
  return total === 0 ? 0 : completedStepCount(session) / total;
}

// A session with no steps counts as completed.
export function isSessionCompleted(session: CookingSession): boolean {
  return session.stepCompletions.every((completed) => completed);
}

export function elapsedMs(session: CookingSession, now: Date = new Date()): number {
  const end = session.endTime ?? now;
  return Math.max(0, end.getTime() - session.startTime.getTime());
}

export function sessionState(session: CookingSession): SessionState {
  if (session.endTime) {
    return "ended";
  }
  if (isSessionCompleted(session)) {
    return "completed";
  }
  return session.isPaused ? "paused" : "active";
}

export function toSessionSnapshot(session: CookingSession): CookingSessionSnapshot {
  const snapshot: CookingSessionSnapshot = {
    recipe_id: session.recipeId,
    step_completions: [...session.stepCompletions],
    start_time: session.startTime.toISOString(),
    is_paused: session.isPaused,
  };
  if (session.endTime) {
    snapshot.end_time = session.endTime.toISOString();
  }
  return snapshot;
}

function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== "string") {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Restores a stored snapshot, or returns null when it does not have the expected shape. */
export function fromSessionSnapshot(value: unknown): CookingSession | null {
  if (!isRecord(value) || typeof value.recipe_id !== "string") {
    return null;
  }
  const completions = value.step_completions;
  if (!Array.isArray(completions) || !completions.every((entry) => typeof entry === "boolean")) {
    return null;
  }
  const startTime = parseTimestamp(value.start_time);
  if (!startTime) {
    return null;
  }
  const endTime = value.end_time == null ? undefined : parseTimestamp(value.end_time);
  if (endTime === null) {
    return null;
  }

  return freezeSession({
    recipeId: value.recipe_id,
    stepCompletions: completions.filter((entry): entry is boolean => typeof entry === "boolean"),
    startTime,
    ...(endTime ? { endTime } : {}),
    isPaused: typeof value.is_paused === "boolean" ? value.is_paused : false,
  });
}
