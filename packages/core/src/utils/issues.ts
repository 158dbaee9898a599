import type { ZodIssue } from 'zod';

export function formatIssues(issues: readonly ZodIssue[]): string {
    return issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}
