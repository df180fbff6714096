import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import AdmZip from 'adm-zip';
import { parseExport } from '../../src/export/exportParser';
import { discoverExports } from '../../src/export/exportSource';
import { preOrder } from '../../src/export/pageTree';
import { ExportFormatError, ExportIOError } from '../../src/core/errors';
import { attachmentPath, entitiesXml, type XmlAttachmentSpec } from '../fixtures/entitiesXml';
import { getPage } from '../fixtures/exportBuilder';
import { writeTree } from '../fixtures/files';

describe('Integration: export parsing', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'md-export-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('XML exports', () => {
    const diagram: XmlAttachmentSpec = { id: '900', pageId: '100', fileName: 'diagram.png' };

    const xmlFiles = (): Record<string, string | Buffer> => ({
      'entities.xml': entitiesXml([
        { id: '100', title: 'Home', body: '<p>Welcome</p>', labels: ['intro', 'ops'] },
        { id: '101', title: 'Guide', parentId: '100', position: 1, body: '<p>Guide</p>' },
        { id: '102', title: 'About', parentId: '100', position: 0 },
        { id: '103', title: 'Guide', parentId: '100', originalVersion: '101', body: '<p>Old guide</p>' }
      ], [diagram]),
      [attachmentPath(diagram)]: Buffer.from('png-bytes')
    });

    it('reads pages, hierarchy, bodies, labels and attachments', async () => {
      await writeTree(tempDir, xmlFiles());

      const exp = await parseExport(tempDir);

      expect(exp.format).toBe('xml');
      expect(exp.space).toEqual({ key: 'DOC', name: 'Documentation' });
      expect(exp.rootIds).toEqual(['100']);
      expect(preOrder(exp).map(page => page.title)).toEqual(['Home', 'About', 'Guide']);

      const home = getPage(exp, '100');
      expect(home.rawContent).toBe('<p>Welcome</p>');
      expect(home.labels).toEqual(['intro', 'ops']);
      expect(home.attachments).toEqual([{ fileName: 'diagram.png', sourcePath: 'attachments/100/900/1' }]);
      expect(home.children).toEqual(['102', '101']);
      expect(getPage(exp, '101').depth).toBe(1);
      expect(exp.pages.has('103')).toBe(false);
    });

    it('reads ZIP archives with a single top-level folder', async () => {
      const zip = new AdmZip();
      for (const [name, content] of Object.entries(xmlFiles())) {
        zip.addFile(`DOC-export/${name}`, Buffer.isBuffer(content) ? content : Buffer.from(content, 'utf8'));
      }
      const zipPath = path.join(tempDir, 'DOC-export.zip');
      zip.writeZip(zipPath);

      const exp = await parseExport(zipPath);

      expect(exp.source.kind).toBe('zip');
      expect(exp.source.name).toBe('DOC-export');
      expect(exp.pages.size).toBe(3);
      const data = await exp.source.readBuffer('attachments/100/900/1');
      expect(data.toString('utf8')).toBe('png-bytes');
    });

    it('rejects a page hierarchy with a cycle', async () => {
      await writeTree(tempDir, {
        'entities.xml': entitiesXml([
          { id: '1', title: 'One', parentId: '2' },
          { id: '2', title: 'Two', parentId: '1' }
        ])
      });

      await expect(parseExport(tempDir)).rejects.toThrow(ExportFormatError);
      await expect(parseExport(tempDir)).rejects.toThrow('Page hierarchy contains a cycle involving: 1, 2');
    });

    it('treats pages with a missing parent as top level', async () => {
      await writeTree(tempDir, {
        'entities.xml': entitiesXml([{ id: '7', title: 'Lost', parentId: '404' }])
      });

      const exp = await parseExport(tempDir);

      expect(exp.rootIds).toEqual(['7']);
      expect(getPage(exp, '7').parentId).toBeUndefined();
    });
  });

  describe('HTML exports', () => {
    it('reads titles, breadcrumbs and attachments', async () => {
      const root = path.join(tempDir, 'team-docs');
      await writeTree(root, {
        'index.html': '<html><head><title>Team Docs</title></head><body><h1>Team Docs</h1></body></html>',
        'Home_1001.html': '<html><head><title>Team Docs : Home</title></head><body>'
          + '<div id="main-content"><p>Hello</p><img src="attachments/1001/2001.png" data-linked-resource-default-alias="logo.png"></div>'
          + '</body></html>',
        'Setup_1002.html': '<html><head><title>Team Docs : Setup</title></head><body>'
          + '<div id="breadcrumbs"><a href="index.html">Team Docs</a><a href="Home_1001.html">Home</a></div>'
          + '<div id="main-content"><p>Run it</p></div>'
          + '</body></html>',
        'attachments/1001/2001.png': Buffer.from('logo')
      });

      const exp = await parseExport(root);

      expect(exp.format).toBe('html');
      expect(exp.space).toEqual({ key: 'team-docs', name: 'Team Docs' });
      expect(exp.rootIds).toEqual(['1001']);

      const home = getPage(exp, '1001');
      expect(home.title).toBe('Home');
      expect(home.sourcePath).toBe('Home_1001.html');
      expect(home.rawContent).toContain('<p>Hello</p>');
      expect(home.attachments).toEqual([{ fileName: 'logo.png', sourcePath: 'attachments/1001/2001.png' }]);

      const setup = getPage(exp, '1002');
      expect(setup.title).toBe('Setup');
      expect(setup.parentId).toBe('1001');
      expect(setup.rawContent).toBe('<p>Run it</p>');
    });
  });

  describe('sources', () => {
    it('rejects a folder without pages', async () => {
      await expect(parseExport(tempDir)).rejects.toThrow(ExportFormatError);
    });

    it('rejects a missing path', async () => {
      await expect(parseExport(path.join(tempDir, 'nope.zip'))).rejects.toThrow(ExportIOError);
    });

    it('rejects a file that is not a ZIP archive', async () => {
      const bogus = path.join(tempDir, 'broken.zip');
      await fs.writeFile(bogus, 'not a zip archive', 'utf8');

      await expect(parseExport(bogus)).rejects.toThrow(ExportIOError);
    });

    it('discovers archives and folders in an imports directory', async () => {
      await writeTree(tempDir, {
        'b-space.zip': 'zip',
        'a-space/entities.xml': '<hibernate-generic/>',
        'notes.txt': 'ignored',
        '.hidden/entities.xml': 'ignored'
      });

      expect(await discoverExports(tempDir)).toEqual([
        { name: 'a-space', path: path.join(tempDir, 'a-space') },
        { name: 'b-space', path: path.join(tempDir, 'b-space.zip') }
      ]);
    });

    it('reports a missing imports directory as an IO error', async () => {
      await expect(discoverExports(path.join(tempDir, 'absent'))).rejects.toThrow(ExportIOError);
    });
  });
});
