import type { z } from 'zod';
import { ConfigurationError } from './errors.js';

/**
 * Parse a value against a schema, throwing ConfigurationError with every
 * issue formatted as "<field path> <message>".
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  label: string
): z.output<S> {
  const parseResult = schema.safeParse(value);
  if (parseResult.success) {
    return parseResult.data;
  }

  const issues = parseResult.error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : label,
    message: issue.message,
  }));

  throw new ConfigurationError(
    `${label} validation failed:\n${issues.map((i) => `${i.path} ${i.message}`).join('\n')}`,
    issues
  );
}
