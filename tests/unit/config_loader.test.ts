import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { loadSettings, loadSettingsFile } from '../../src/cli/configLoader';
import { SettingsError } from '../../src/core/errors';

describe('Unit: settings loading', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'md-settings-test-'));
  });

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true });
  });

  it('uses the defaults without a settings file', async () => {
    const { settings, configPath } = await loadSettings({}, {}, cwd);

    expect(configPath).toBeUndefined();
    expect(settings.concurrency).toBe(4);
    expect(settings.logging.level).toBe('info');
  });

  it('reads settings.yaml from the working directory', async () => {
    await fs.writeFile(path.join(cwd, 'settings.yaml'), 'concurrency: 2\nexclude_pages:\n  - "Archive/**"\n', 'utf8');

    const { settings, configPath } = await loadSettings({}, {}, cwd);

    expect(configPath).toBe(path.join(cwd, 'settings.yaml'));
    expect(settings.concurrency).toBe(2);
    expect(settings.excludePages).toEqual(['Archive/**']);
  });

  it('lets the environment override the file and flags override both', async () => {
    await fs.writeFile(path.join(cwd, 'custom.yaml'), 'concurrency: 2\nlogging:\n  level: debug\n  format: json\n', 'utf8');

    const { settings } = await loadSettings(
      { config: 'custom.yaml', concurrency: '6', logLevel: 'error' },
      { LOG_LEVEL: 'warn', LOG_FORMAT: 'human' },
      cwd
    );

    expect(settings.concurrency).toBe(6);
    expect(settings.logging).toEqual({ level: 'error', format: 'human' });
  });

  it('fails when an explicit settings file is missing', async () => {
    await expect(loadSettings({ config: 'missing.yaml' }, {}, cwd)).rejects.toThrow('Config file not found: missing.yaml');
  });

  it('fails on invalid YAML', async () => {
    await fs.writeFile(path.join(cwd, 'settings.yaml'), 'content: [unclosed\n', 'utf8');

    await expect(loadSettingsFile(undefined, cwd)).rejects.toThrow(SettingsError);
  });

  it('rejects a concurrency flag that is not an integer', async () => {
    await expect(loadSettings({ concurrency: 'many' }, {}, cwd)).rejects.toThrow('Invalid concurrency: "many" is not an integer');
  });
});
