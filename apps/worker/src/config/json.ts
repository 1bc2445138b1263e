import { z } from 'zod';

import { ConfigurationError, toErrorMessage } from '../middleware/errors';

function issueSummary(err: z.ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseWithSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  opts: { field: string },
): T {
  const r = schema.safeParse(value);
  if (!r.success) {
    throw new ConfigurationError(`Invalid value in ${opts.field}: ${issueSummary(r.error)}`);
  }
  return r.data;
}

export function parseJsonDocument<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  text: string,
  opts: { field: string },
): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text) as unknown;
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in ${opts.field}: ${toErrorMessage(err)}`);
  }

  return parseWithSchema(schema, parsed, opts);
}
