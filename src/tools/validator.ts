import { z } from 'zod';
import { ValidationError, ValidationIssue } from '../errors';

function fieldOf(path: (string | number)[]): string {
  return path.length > 0 ? path.join('.') : 'input';
}

/** Flattens zod issues to one (field, reason) pair per violation. */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const issue of error.issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      for (const key of issue.keys) {
        issues.push({ field: fieldOf([...issue.path, key]), reason: 'Unrecognized field' });
      }
      continue;
    }
    issues.push({ field: fieldOf(issue.path), reason: issue.message });
  }
  return issues;
}

/**
 * Parses a tool's input strictly. Every violation is reported, not just the
 * first; the parsed value carries defaults and coerced integers.
 */
export function validateInput<S extends z.ZodTypeAny>(toolName: string, schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new ValidationError(toValidationIssues(result.error), `Invalid input for ${toolName}`);
  }
  return result.data;
}
