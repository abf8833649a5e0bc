/** `*` matches any run of characters, `?` exactly one; the whole value must match. */
export function wildcardToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map((ch) => {
      if (ch === '*') return '.*';
      if (ch === '?') return '.';
      return ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`);
}

export function hasWildcard(pattern: string): boolean {
  return pattern.includes('*') || pattern.includes('?');
}

export function matchesWildcard(pattern: string, value: string): boolean {
  return hasWildcard(pattern) ? wildcardToRegExp(pattern).test(value) : pattern === value;
}

/** True when any pattern matches; an empty or absent list matches everything. */
export function matchesAnyWildcard(patterns: readonly string[] | undefined, value: string): boolean {
  if (!patterns || patterns.length === 0) return true;
  return patterns.some((p) => matchesWildcard(p, value));
}
