import { ConflictError, UniqueViolationError } from "../errors.js";

export interface CreateOrFetchResult<T> {
  row: T;
  created: boolean;
}

/**
 * Insert, and on a unique-key collision read back the row that won.
 * Concurrent callers all end up with the same row; exactly one sees `created`.
 */
export async function createOrFetch<T>(
  insert: () => Promise<T>,
  fetch: () => Promise<T | null>,
): Promise<CreateOrFetchResult<T>> {
  try {
    return { row: await insert(), created: true };
  } catch (error) {
    if (!(error instanceof UniqueViolationError)) {
      throw error;
    }

    const existing = await fetch();
    if (!existing) {
      throw new ConflictError(
        "Unique key collision reported but no existing row was found",
        error.context,
      );
    }
    return { row: existing, created: false };
  }
}
