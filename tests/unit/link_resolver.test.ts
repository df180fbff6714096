import { LinkResolver, attachmentOutputPath, getDirectoryPath, getRelativePath } from '../../src/transform/linkResolver';
import { getPage, makeExport } from '../fixtures/exportBuilder';

describe('Unit: link resolution', () => {
  describe('relative paths', () => {
    it.each([
      ['', 'a/b.md', 'a/b.md'],
      ['a', 'a/b.md', 'b.md'],
      ['a/b', 'a/c.md', '../c.md'],
      ['a/b', 'x/y/z.md', '../../x/y/z.md']
    ])('from "%s" to %s is %s', (fromDir, toFile, expected) => {
      expect(getRelativePath(fromDir, toFile)).toBe(expected);
    });

    it('takes the directory of a file path', () => {
      expect(getDirectoryPath('a/b/c.md')).toBe('a/b');
      expect(getDirectoryPath('c.md')).toBe('');
    });
  });

  describe('LinkResolver', () => {
    const exp = makeExport([
      { id: '1', title: 'Home', attachments: [{ fileName: 'Logo.PNG', sourcePath: 'attachments/1/5/1' }] },
      { id: '2', title: 'Guide', parentId: '1' },
      { id: '3', title: 'Guide' }
    ]);
    const paths = new Map([['1', 'home.md'], ['2', 'home/guide.md'], ['3', 'guide.md']]);
    const resolver = new LinkResolver(exp, paths, 'attachments');

    it('resolves duplicate titles to the first page in pre-order', () => {
      expect(resolver.resolvePage(getPage(exp, '3'), { type: 'page', title: 'Guide' })).toBe('2');
    });

    it('keeps same-page anchors local', () => {
      expect(resolver.pageHref(getPage(exp, '2'), { type: 'page', anchor: 'Step 2' })).toBe('#Step%202');
    });

    it('leaves links into other spaces unresolved', () => {
      expect(resolver.pageHref(getPage(exp, '1'), { type: 'page', title: 'Guide', spaceKey: 'OTHER' })).toBeUndefined();
      expect(resolver.pageHref(getPage(exp, '1'), { type: 'page', title: 'Guide', spaceKey: 'DOC' })).toBe('home/guide.md');
    });

    it('never resolves pages without an output path', () => {
      const partial = new LinkResolver(exp, new Map([['1', 'home.md']]), 'attachments');
      expect(partial.resolvePage(getPage(exp, '1'), { type: 'page', title: 'Guide' })).toBeUndefined();
    });

    it('matches attachment names case-insensitively as a fallback', () => {
      expect(resolver.resolveAttachment(getPage(exp, '2'), { fileName: 'logo.png', pageTitle: 'Home' })).toEqual({
        pageId: '1',
        fileName: 'Logo.PNG',
        sourcePath: 'attachments/1/5/1',
        outputPath: 'attachments/1/Logo.PNG'
      });
    });

    it('keeps attachment output paths to one segment per page and file', () => {
      expect(attachmentOutputPath('attachments', '1', '../../../escaped.txt')).toBe('attachments/1/-..-..-escaped.txt');
      expect(attachmentOutputPath('files', '../2', 'a\\b.png')).toBe('files/-2/a-b.png');
      expect(attachmentOutputPath('attachments', '1', '..')).toBe('attachments/1/untitled');
    });
  });
});
