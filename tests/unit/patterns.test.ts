import { compilePatterns, matchesPattern } from '../../src/util/patterns';

describe('Unit: path patterns', () => {
  it('keeps a single star inside one segment', () => {
    expect(matchesPattern('Home/Archive/Old', 'Home/Archive/*')).toBe(true);
    expect(matchesPattern('Home/Archive/Old/Deep', 'Home/Archive/*')).toBe(false);
  });

  it('lets a double star span whole segments', () => {
    expect(matchesPattern('Home/Archive/Old/Deep', 'Home/Archive/**')).toBe(true);
    expect(matchesPattern('Drafts', '**/Drafts')).toBe(true);
    expect(matchesPattern('Home/Team/Drafts', '**/Drafts')).toBe(true);
    expect(matchesPattern('Home/Team/Drafts 2', '**/Drafts')).toBe(false);
  });

  it('is case-sensitive unless told otherwise', () => {
    expect(matchesPattern('Home/Archive', 'home/archive')).toBe(false);
    expect(matchesPattern('Home/Archive', 'home/archive', { caseSensitive: false })).toBe(true);
  });

  it('ignores blank patterns and reports the first match', () => {
    const matcher = compilePatterns(['', '  ', 'A', 'B/*', 'B/**']);

    expect(matcher.patterns).toEqual(['A', 'B/*', 'B/**']);
    expect(matcher.match('B/x')).toBe('B/*');
    expect(matcher.match('C')).toBeUndefined();
  });
});
