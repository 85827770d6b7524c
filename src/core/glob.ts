/**
 * Minimal glob matching for layer paths and override lookups.
 * Supports `**`, `*` and `?`; everything else matches literally.
 */

export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '*') {
      if (pattern[i + 1] === '*') {
        const slash = pattern[i + 2] === '/';
        source += slash ? '(?:.*/)?' : '.*';
        i += slash ? 2 : 1;
      } else {
        source += '[^/]*';
      }
    } else if (ch === '?') {
      source += '[^/]';
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

export function matchesAny(filePath: string, patterns: string[]): boolean {
  const normalized = toPosixPath(filePath);
  return patterns.some(pattern => globToRegExp(pattern).test(normalized));
}
