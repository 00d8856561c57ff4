export type GameErrorKind =
  | "InvalidState"
  | "InvalidQuantity"
  | "InsufficientFunds"
  | "InsufficientSeeds"
  | "InsufficientStock"
  | "RecipeNotCookable"
  | "RecipeLocked"
  | "PersistenceCorrupt"
  | "PersistenceWriteFailed";

// Recoverable failure raised by an engine operation. The state is never left
// partially mutated when one of these is thrown.
export class GameError extends Error {
  readonly kind: GameErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: GameErrorKind, message: string, opts?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "GameError";
    this.kind = kind;
    this.details = opts?.details;
  }
}

export function isGameError(error: unknown, kind?: GameErrorKind): error is GameError {
  if (!(error instanceof GameError)) return false;
  return kind === undefined || error.kind === kind;
}

export function invalidQuantity(quantity: number): GameError {
  return new GameError("InvalidQuantity", `quantity must be a positive integer, got ${quantity}`, {
    details: { quantity },
  });
}

export function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity <= 0) throw invalidQuantity(quantity);
}
