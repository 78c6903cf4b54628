import type { ZodError } from 'zod';

/**
 * Renders zod issues as `"path.to.field" message` strings.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `"${issue.path.join('.')}" ` : '';
    return `${path}${issue.message}`;
  });
}
