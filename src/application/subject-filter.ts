/**
 * Subject pattern matching with the broker's wildcard rules.
 *
 * Subjects are dot-separated tokens. `*` matches exactly one token and `>`
 * matches one or more trailing tokens (it is only valid as the last token).
 */
export function subjectMatches(pattern: string, subject: string): boolean {
  const p = pattern.split('.');
  const s = subject.split('.');

  for (let i = 0; i < p.length; i++) {
    const token = p[i];
    if (token === '>') return i === p.length - 1 && s.length > i;
    const part = s[i];
    if (part === undefined) return false;
    if (token !== '*' && token !== part) return false;
  }
  return p.length === s.length;
}

/** True when `subject` matches any pattern; an empty list matches everything. */
export function matchesAny(patterns: readonly string[], subject: string): boolean {
  if (patterns.length === 0) return true;
  return patterns.some((pattern) => subjectMatches(pattern, subject));
}
