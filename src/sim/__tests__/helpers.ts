import { GameError, isGameError } from "../errors";
import { addSeconds } from "../time";

export const T0 = new Date("2025-03-01T09:00:00.000Z");

export function at(seconds: number): Date {
  return addSeconds(T0, seconds);
}

// The GameError kind thrown by `fn`, "other" for any other throw, null if it returned.
export function errorKind(fn: () => unknown): string | null {
  try {
    fn();
  } catch (error) {
    return isGameError(error) ? error.kind : "other";
  }
  return null;
}

export function thrownGameError(fn: () => unknown): GameError {
  try {
    fn();
  } catch (error) {
    if (isGameError(error)) return error;
    throw error;
  }
  throw new Error("expected a GameError to be thrown");
}
