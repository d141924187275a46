import type { z } from 'zod';

/**
 * One entry per issue, prefixed with the dotted path when there is one
 */
export function zodIssueLines(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export function formatZodIssues(error: z.ZodError): string {
  return zodIssueLines(error).join('; ');
}
