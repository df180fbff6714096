import { Minimatch } from 'minimatch';

export interface PatternOptions {
  caseSensitive?: boolean;
}

export interface PathMatcher {
  readonly patterns: readonly string[];
  /** First pattern matching the slash-joined path, if any */
  match(path: string): string | undefined;
}

/**
 * Compile exclusion globs over slash-separated paths: `*` stays within one
 * segment, `**` spans any number of whole segments. Negation, comments and
 * extglobs are disabled so titles are matched literally apart from the
 * wildcards.
 */
export function compilePatterns(patterns: readonly string[], options: PatternOptions = {}): PathMatcher {
  const compiled = patterns
    .filter(pattern => pattern.trim() !== '')
    .map(pattern => ({
      pattern,
      matcher: new Minimatch(pattern, {
        dot: true,
        nocase: options.caseSensitive === false,
        noext: true,
        nonegate: true,
        nocomment: true
      })
    }));

  return {
    patterns: compiled.map(entry => entry.pattern),
    match(path: string): string | undefined {
      return compiled.find(entry => entry.matcher.match(path))?.pattern;
    }
  };
}

export function matchesPattern(path: string, pattern: string, options: PatternOptions = {}): boolean {
  return compilePatterns([pattern], options).match(path) !== undefined;
}

export function joinPath(segments: readonly string[]): string {
  return segments.join('/');
}
