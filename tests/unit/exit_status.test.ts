import { CommanderError } from 'commander';
import { EXIT_CODES, exitCodeForError, exitCodeForReport, exitCodeForReports } from '../../src/core/exitStatus';
import { ExportFormatError, ExportIOError, SettingsError } from '../../src/core/errors';

describe('Unit: exit status', () => {
  it('maps build reports to success or page failures', () => {
    expect(exitCodeForReport({ failed: 0 })).toBe(EXIT_CODES.SUCCESS);
    expect(exitCodeForReport({ failed: 2 })).toBe(EXIT_CODES.PAGE_FAILURES);
    expect(exitCodeForReports([{ failed: 0 }, { failed: 1 }])).toBe(EXIT_CODES.PAGE_FAILURES);
    expect(exitCodeForReports([])).toBe(EXIT_CODES.SUCCESS);
  });

  it('maps errors to usage or fatal codes', () => {
    expect(exitCodeForError(new SettingsError('bad'))).toBe(2);
    expect(exitCodeForError(new CommanderError(1, 'commander.unknownCommand', 'unknown command'))).toBe(2);
    expect(exitCodeForError(new ExportFormatError('no pages'))).toBe(3);
    expect(exitCodeForError(new ExportIOError('unreadable', '/tmp/x.zip'))).toBe(3);
    expect(exitCodeForError(new Error('unexpected'))).toBe(3);
  });
});
