// lib/utils/validation.ts
import { z } from 'zod';

export type Validated<T> = { valid: true; data: T } | { valid: false; errors: string[] };

export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): Validated<z.infer<S>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { valid: true, data: result.data };
  }
  return { valid: false, errors: formatIssues(result.error) };
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
