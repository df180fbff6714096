import { plainText, type MarkupNode } from '../models/markup.js';
import { compilePatterns, joinPath, type PatternOptions } from '../util/patterns.js';

export interface SectionFilterResult {
  nodes: MarkupNode[];
  /** Heading paths of the removed sections, in document order */
  removedSections: string[];
}

/**
 * Drop sections whose heading path matches an exclusion pattern. A section
 * is its heading plus everything up to the next heading of the same or a
 * shallower level. Only top-level headings open sections; headings nested
 * in panels or lists belong to the surrounding section.
 */
export function filterSections(
  nodes: readonly MarkupNode[],
  patterns: readonly string[],
  options: PatternOptions = {}
): SectionFilterResult {
  const matcher = compilePatterns(patterns, options);
  if (matcher.patterns.length === 0) {
    return { nodes: [...nodes], removedSections: [] };
  }

  const kept: MarkupNode[] = [];
  const removedSections: string[] = [];
  const stack: Array<{ level: number; title: string }> = [];
  let skipLevel: number | undefined;

  for (const node of nodes) {
    if (node.kind !== 'heading') {
      if (skipLevel === undefined) kept.push(node);
      continue;
    }

    if (skipLevel !== undefined && node.level > skipLevel) {
      continue;
    }
    skipLevel = undefined;

    while (stack.length > 0 && stack[stack.length - 1].level >= node.level) {
      stack.pop();
    }
    stack.push({ level: node.level, title: plainText(node.children).replace(/\s+/g, ' ').trim() });

    const path = joinPath(stack.map(entry => entry.title));
    if (matcher.match(path) !== undefined) {
      removedSections.push(path);
      skipLevel = node.level;
      continue;
    }

    kept.push(node);
  }

  return { nodes: kept, removedSections };
}
