// This module validates tool call arguments against declared input schemas and reports structured violations.

import { z } from 'zod';

export interface SchemaViolation {
  path: string;
  reason: string;
}

export type ValidationResult<T> = { ok: true; data: T } | { ok: false; violations: SchemaViolation[] };

// This helper renders one zod issue path as a dot-joined property path; the root is the empty string.
function formatPath(path: ReadonlyArray<string | number>): string {
  return path.map(String).join('.');
}

// This helper expands one zod issue into violations, one per unknown key for strict objects.
function toViolations(issue: z.ZodIssue): SchemaViolation[] {
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return issue.keys.map((key) => ({
      path: formatPath([...issue.path, key]),
      reason: 'Unrecognized property.'
    }));
  }

  return [
    {
      path: formatPath(issue.path),
      reason: issue.message
    }
  ];
}

// This function validates raw arguments and returns either the parsed value or every violation found.
export function validateToolArguments<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  args: unknown
): ValidationResult<z.output<TSchema>> {
  const parsed = schema.safeParse(args);
  if (parsed.success) {
    return { ok: true, data: parsed.data };
  }

  return {
    ok: false,
    violations: parsed.error.issues.flatMap(toViolations)
  };
}
