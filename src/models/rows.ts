import { z } from "zod";
import { DataIntegrityError } from "../utils/errors.js";

/**
 * Parse one database row against its declared shape. A mismatch means the
 * schema and the code disagree, so it fails loudly instead of leaking
 * half-typed values upward.
 */
export const parseRow = <Schema extends z.ZodTypeAny>(
  schema: Schema,
  row: unknown,
  table: string
): z.output<Schema> => {
  const result = schema.safeParse(row);
  if (!result.success) {
    throw new DataIntegrityError(
      `Unexpected row shape from ${table}`,
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  return result.data;
};

/** COUNT(*) comes back as number, or as string for BIGINT-as-string drivers. */
export const CountRowSchema = z.object({ total: z.coerce.number().int().min(0) });
