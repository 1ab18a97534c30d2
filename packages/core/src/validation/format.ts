/**
 * Render zod issues as a readable, path-prefixed list.
 */
export function formatZodIssues(
  label: string,
  err: { issues: Array<{ path: Array<string | number>; message: string }> }
): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
