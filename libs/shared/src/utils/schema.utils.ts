import { z } from 'zod';
import { DataShapeError } from '../errors/feedback.errors';

/**
 * Validate a collaborator response against its schema, converting any
 * mismatch into a DataShapeError naming `source`.
 */
export function validateShape<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  source: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DataShapeError(
      source,
      result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return result.data;
}
