/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@chartlane/utils';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.infer<T> {
  const result = schema.safeParse(rawArgs);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
      formattedMessages: messages,
    });
  }
  return result.data;
}

/**
 * Drop options Commander left unset so schema defaults apply.
 *
 * Keys are never renamed and string values are never reinterpreted: a chart
 * id such as "10001" must stay a string. Numeric flags go through coerce.ts.
 */
export function normalizeOptions(options: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined && value !== null) {
      normalized[key] = value;
    }
  }
  return normalized;
}
