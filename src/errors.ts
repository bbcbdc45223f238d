/**
 * Error taxonomy shared by the engine services, the stores and the HTTP layer.
 */
export class TournamentEngineError extends Error {
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.context = context;
  }
}

/** Bad input shape, insufficient participants, invalid reward config. Never retried. */
export class ValidationError extends TournamentEngineError {}

export class NotFoundError extends TournamentEngineError {}

/** Duplicate or concurrent operation that lost a conditional write. */
export class ConflictError extends TournamentEngineError {}

/** Storage failure worth retrying (connection loss, serialization failure, deadlock). */
export class TransientStorageError extends TournamentEngineError {}

/** Badge tier and resolved rank disagree. Logged as an alert, never thrown to callers. */
export class DataDriftError extends TournamentEngineError {}

/** Raised by a store when a uniqueness constraint rejects an insert. */
export class UniqueViolationError extends TournamentEngineError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
