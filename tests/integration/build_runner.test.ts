import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { BuildRunner } from '../../src/core/buildRunner';
import { SettingsError } from '../../src/core/errors';
import { exitCodeForError, exitCodeForReport } from '../../src/core/exitStatus';
import { BuildCache } from '../../src/fs/buildCache';
import { FileSystemWriter } from '../../src/fs/outputWriter';
import { attachmentPath, entitiesXml, type XmlAttachmentSpec, type XmlPageSpec } from '../fixtures/entitiesXml';
import { makeSettings } from '../fixtures/exportBuilder';
import { pathExists, writeTree } from '../fixtures/files';

const diagram: XmlAttachmentSpec = { id: '900', pageId: '100', fileName: 'diagram.png' };

const basePages: XmlPageSpec[] = [
  {
    id: '100',
    title: 'Home',
    body: '<p>Welcome to <ac:link><ri:page ri:content-title="Guide" /></ac:link>.</p>'
      + '<ac:image><ri:attachment ri:filename="diagram.png" /></ac:image>'
  },
  { id: '101', title: 'Guide', parentId: '100', position: 0, body: '<h1>Guide</h1><p>Steps</p>' },
  { id: '102', title: 'Archive', parentId: '100', position: 1, body: '<p>Old</p>' },
  { id: '103', title: 'Legacy', parentId: '102', body: '<p>Older</p>' }
];

class FailingWriter extends FileSystemWriter {
  constructor(root: string, private readonly failOn: string) {
    super(root);
  }

  async writePage(relativePath: string, markdown: string): Promise<void> {
    if (relativePath === this.failOn) throw new Error('disk full');
    await super.writePage(relativePath, markdown);
  }
}

describe('Integration: build runner', () => {
  let tempDir: string;
  let sourceDir: string;
  let outDir: string;

  const writeExport = (pages: XmlPageSpec[] = basePages, attachments: XmlAttachmentSpec[] = [diagram]) => writeTree(sourceDir, {
    'entities.xml': entitiesXml(pages, attachments),
    ...Object.fromEntries(attachments.map((attachment): [string, Buffer] => [attachmentPath(attachment), Buffer.from(`${attachment.id}-bytes`)]))
  });

  const withBody = (id: string, body: string) => basePages.map(page => (page.id === id ? { ...page, body } : page));

  const readOutput = (relative: string) => fs.readFile(path.join(outDir, ...relative.split('/')), 'utf8');

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'md-build-test-'));
    sourceDir = path.join(tempDir, 'export');
    outDir = path.join(tempDir, 'out');
    await writeExport();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('converts every page, copies attachments and writes the cache', async () => {
    const report = await new BuildRunner(makeSettings()).run(sourceDir, outDir);

    expect(report).toMatchObject({ converted: 4, skipped: 0, failed: 0, excluded: 0, dryRun: false });
    expect(report.pages.map(page => page.outputPath)).toEqual([
      'home.md',
      'home/archive.md',
      'home/archive/legacy.md',
      'home/guide.md'
    ]);
    expect(await readOutput('home.md')).toBe(
      '---\ntitle: Home\n---\n\nWelcome to [Guide](home/guide.md).\n\n![](attachments/100/diagram.png)\n'
    );
    expect(await readOutput('home/guide.md')).toBe('---\ntitle: Guide\n---\n\n# Guide\n\nSteps\n');
    expect(await readOutput('attachments/100/diagram.png')).toBe('900-bytes');

    const cache = new BuildCache(outDir);
    expect(await cache.load()).toEqual([]);
    expect(cache.size).toBe(4);
    expect(cache.get('103')?.outputPath).toBe('home/archive/legacy.md');
  });

  it('skips every page on an unchanged second run', async () => {
    const runner = new BuildRunner(makeSettings());
    await runner.run(sourceDir, outDir);

    const second = await runner.run(sourceDir, outDir);

    expect(second).toMatchObject({ converted: 0, skipped: 4, failed: 0 });
  });

  it('rebuilds only the page whose content changed', async () => {
    await new BuildRunner(makeSettings()).run(sourceDir, outDir);
    await writeExport(basePages.map(page => (page.id === '101' ? { ...page, body: '<p>New steps</p>' } : page)));

    const report = await new BuildRunner(makeSettings()).run(sourceDir, outDir);

    expect(report).toMatchObject({ converted: 1, skipped: 3 });
    expect(report.pages.find(page => page.pageId === '101')?.status).toBe('converted');
    expect(await readOutput('home/guide.md')).toBe('---\ntitle: Guide\n---\n\nNew steps\n');
  });

  it('rebuilds everything when output settings change', async () => {
    await new BuildRunner(makeSettings()).run(sourceDir, outDir);

    const report = await new BuildRunner(makeSettings({ content: { unknownMacroPolicy: 'strip' } })).run(sourceDir, outDir);

    expect(report).toMatchObject({ converted: 4, skipped: 0 });
  });

  it('converts everything when forced', async () => {
    await new BuildRunner(makeSettings()).run(sourceDir, outDir);

    const report = await new BuildRunner(makeSettings(), { force: true }).run(sourceDir, outDir);

    expect(report).toMatchObject({ converted: 4, skipped: 0 });
  });

  it('rewrites an output file deleted since the last run', async () => {
    await new BuildRunner(makeSettings()).run(sourceDir, outDir);
    await fs.rm(path.join(outDir, 'home', 'guide.md'));

    const report = await new BuildRunner(makeSettings()).run(sourceDir, outDir);

    expect(report).toMatchObject({ converted: 1, skipped: 3 });
    expect(await pathExists(path.join(outDir, 'home', 'guide.md'))).toBe(true);
  });

  it('writes nothing in a dry run', async () => {
    const report = await new BuildRunner(makeSettings(), { dryRun: true }).run(sourceDir, outDir);

    expect(report).toMatchObject({ converted: 4, dryRun: true });
    expect(await pathExists(outDir)).toBe(false);
  });

  it('keeps building when one page fails', async () => {
    const runner = new BuildRunner(makeSettings(), {
      createWriter: root => new FailingWriter(root, 'home/guide.md')
    });

    const report = await runner.run(sourceDir, outDir);

    expect(report).toMatchObject({ converted: 3, failed: 1 });
    expect(report.pages.find(page => page.pageId === '101')).toEqual({
      pageId: '101',
      title: 'Guide',
      outputPath: 'home/guide.md',
      status: 'failed',
      error: 'disk full'
    });
    expect(exitCodeForReport(report)).toBe(1);
    expect(await pathExists(path.join(outDir, 'home', 'archive.md'))).toBe(true);

    const retry = await new BuildRunner(makeSettings()).run(sourceDir, outDir);
    expect(retry).toMatchObject({ converted: 1, skipped: 3, failed: 0 });
  });

  it('leaves excluded subtrees out of the build', async () => {
    const report = await new BuildRunner(makeSettings({ excludePages: ['Home/Archive'] })).run(sourceDir, outDir);

    expect(report).toMatchObject({ converted: 2, excluded: 2 });
    expect(await pathExists(path.join(outDir, 'home', 'archive.md'))).toBe(false);
    expect(await pathExists(path.join(outDir, 'home', 'archive'))).toBe(false);
  });

  it('renders links to excluded pages as plain text with one warning', async () => {
    const report = await new BuildRunner(makeSettings({ excludePages: ['Home/Guide'] })).run(sourceDir, outDir);

    expect(report).toMatchObject({ converted: 3, excluded: 1 });
    expect(await readOutput('home.md')).toBe(
      '---\ntitle: Home\n---\n\nWelcome to Guide.\n\n![](attachments/100/diagram.png)\n'
    );
    expect(report.warnings).toEqual([{
      code: 'unresolved-reference',
      message: 'Unresolved page link "Guide" on page "Home"',
      pageId: '100',
      outputPath: 'home.md'
    }]);
  });

  it('removes excluded sections and reports them per page', async () => {
    const report = await new BuildRunner(makeSettings({ excludeSections: ['Guide'] })).run(sourceDir, outDir);

    expect(await readOutput('home/guide.md')).toBe('---\ntitle: Guide\n---\n');
    expect(report.pages.find(page => page.pageId === '101')).toEqual({
      pageId: '101',
      title: 'Guide',
      outputPath: 'home/guide.md',
      status: 'converted',
      removedSections: ['Guide']
    });
    expect(report.pages.find(page => page.pageId === '102')?.removedSections).toBeUndefined();
  });

  it('rebuilds everything when section exclusions change', async () => {
    await new BuildRunner(makeSettings()).run(sourceDir, outDir);

    const report = await new BuildRunner(makeSettings({ excludeSections: ['Guide'] })).run(sourceDir, outDir);

    expect(report).toMatchObject({ converted: 4, skipped: 0 });
  });

  it('neither copies nor warns about images in excluded sections', async () => {
    await writeExport(withBody('100', '<p>Welcome</p><h2>Internal</h2>'
      + '<ac:image><ri:attachment ri:filename="diagram.png" /></ac:image>'
      + '<ac:image><ri:attachment ri:filename="missing.png" /></ac:image>'));

    const report = await new BuildRunner(makeSettings({ excludeSections: ['Internal'] })).run(sourceDir, outDir);

    expect(await readOutput('home.md')).toBe('---\ntitle: Home\n---\n\nWelcome\n');
    expect(await pathExists(path.join(outDir, 'attachments'))).toBe(false);
    expect(report.warnings).toEqual([]);
  });

  it('keeps attachments with path-like names inside the output directory', async () => {
    const escaping: XmlAttachmentSpec = { id: '901', pageId: '100', fileName: '../../../escaped.txt' };
    await writeExport(
      withBody('100', '<p><ac:link><ri:attachment ri:filename="../../../escaped.txt" /></ac:link></p>'),
      [escaping]
    );

    const report = await new BuildRunner(makeSettings()).run(sourceDir, outDir);

    expect(report.warnings).toEqual([]);
    expect(await readOutput('attachments/100/-..-..-escaped.txt')).toBe('901-bytes');
    expect(await readOutput('home.md')).toBe(
      '---\ntitle: Home\n---\n\n[../../../escaped.txt](attachments/100/-..-..-escaped.txt)\n'
    );
    expect(await pathExists(path.join(tempDir, 'escaped.txt'))).toBe(false);
  });

  it('orders warnings by output path and lists unknown macros', async () => {
    await writeExport(basePages.map(page => {
      if (page.id === '101') return { ...page, body: '<p><ac:link><ri:page ri:content-title="Nowhere" /></ac:link></p>' };
      if (page.id === '102') return { ...page, body: '<p><ac:link><ri:page ri:content-title="Gone" /></ac:link></p>' };
      if (page.id === '103') return { ...page, body: '<ac:structured-macro ac:name="toc" />' };
      return page;
    }));

    const report = await new BuildRunner(makeSettings()).run(sourceDir, outDir);

    expect(report.warnings).toEqual([
      {
        code: 'unresolved-reference',
        message: 'Unresolved page link "Gone" on page "Archive"',
        pageId: '102',
        outputPath: 'home/archive.md'
      },
      {
        code: 'unresolved-reference',
        message: 'Unresolved page link "Nowhere" on page "Guide"',
        pageId: '101',
        outputPath: 'home/guide.md'
      }
    ]);
    expect(report.unknownMacros).toEqual(['toc']);
  });

  it('drops cache entries of pages removed from the export', async () => {
    await new BuildRunner(makeSettings()).run(sourceDir, outDir);
    await writeExport(basePages.filter(page => page.id !== '103'));

    await new BuildRunner(makeSettings()).run(sourceDir, outDir);

    const cache = new BuildCache(outDir);
    await cache.load();
    expect(cache.size).toBe(3);
    expect(cache.get('103')).toBeUndefined();
  });

  it('reports cache status and removes output on clean', async () => {
    const runner = new BuildRunner(makeSettings());
    await runner.run(sourceDir, outDir);

    expect(await runner.status(outDir)).toMatchObject({ entries: 4, settingsMatch: true, warnings: [] });
    expect(await new BuildRunner(makeSettings({ output: { maxHeadingLevel: 2 } })).status(outDir))
      .toMatchObject({ settingsMatch: false });

    await runner.clean(outDir);
    expect(await pathExists(outDir)).toBe(false);
  });

  it('refuses to clean the filesystem root or the working directory', async () => {
    const runner = new BuildRunner(makeSettings());

    await expect(runner.clean(path.parse(process.cwd()).root)).rejects.toBeInstanceOf(SettingsError);
    await expect(runner.clean(process.cwd())).rejects.toThrow(`Refusing to remove ${process.cwd()}`);
    expect(exitCodeForError(new SettingsError('Refusing to remove /'))).toBe(2);
  });

  it('starts over when the cache file is corrupt', async () => {
    await new BuildRunner(makeSettings()).run(sourceDir, outDir);
    await fs.writeFile(path.join(outDir, '.confluence-md-cache.json'), 'garbage', 'utf8');

    const report = await new BuildRunner(makeSettings()).run(sourceDir, outDir);

    expect(report).toMatchObject({ converted: 4, skipped: 0 });
    expect(report.warnings.map(warning => warning.code)).toEqual(['cache-corruption']);
  });
});
