import type { ZodSchema } from "zod";
import { type AppError, validation } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Validate submitted form fields against a Zod schema.
 * Returns a typed Result and does not throw. Repeated fields keep their last value.
 */
export const validateForm = <T>(schema: ZodSchema<T>, form: FormData): Result<T, AppError> => {
  const fields: Record<string, string> = {};
  for (const [name, value] of form.entries()) {
    if (typeof value === "string") fields[name] = value;
  }
  const result = schema.safeParse(fields);
  if (!result.success) {
    const { fieldErrors, formErrors } = result.error.flatten();
    return err(validation({ fieldErrors, formErrors }));
  }
  return ok(result.data);
};

/** Flat list of messages from a validation error, for redisplay in a form */
export const validationMessages = (error: AppError): string[] => {
  const fieldErrors = error.details?.["fieldErrors"];
  const formErrors = error.details?.["formErrors"];
  const messages: string[] = [];
  for (const source of [formErrors, ...(isRecord(fieldErrors) ? Object.values(fieldErrors) : [])]) {
    if (Array.isArray(source)) {
      for (const m of source) if (typeof m === "string") messages.push(m);
    }
  }
  return messages.length > 0 ? messages : [error.message];
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);
