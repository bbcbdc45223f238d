import type { Context } from "hono";
import type { ZodError } from "zod";

type ValidationResult =
  | { success: true }
  | { success: false; error: ZodError };

/** zValidator hook answering with the `{ error }` body the rest of the API uses */
export function validationHook(result: ValidationResult, c: Context) {
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      .join("; ");
    return c.json({ error: message }, 400);
  }
}
