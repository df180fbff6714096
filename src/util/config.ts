import type {
  ContentSettings,
  FilenameStyle,
  FrontmatterField,
  LoggingSettings,
  OutputSettings,
  Settings,
  UnknownMacroPolicy
} from '../models/entities.js';
import { SettingsError } from '../core/errors.js';
import { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from './logger.js';
import { digestParts } from './hash.js';
import { logger } from './logger.js';

export const FRONTMATTER_FIELDS: readonly FrontmatterField[] = ['title', 'id', 'parent', 'created', 'modified', 'labels'];
export const UNKNOWN_MACRO_POLICIES: readonly UnknownMacroPolicy[] = ['comment', 'strip', 'preserve_text'];
export const FILENAME_STYLES: readonly FilenameStyle[] = ['slugify', 'preserve'];

export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 32;

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  importsDir: 'imports',
  exportsDir: 'exports',
  concurrency: 4,
  excludePages: [],
  excludeSections: [],
  caseSensitivePatterns: true,
  content: {
    includeFrontmatter: true,
    frontmatterFields: ['title'],
    unknownMacroPolicy: 'comment'
  },
  output: {
    filenameStyle: 'slugify',
    preserveHierarchy: true,
    maxHeadingLevel: 6,
    attachmentsDir: 'attachments'
  },
  logging: {
    level: 'info',
    format: 'human'
  }
};

/** Values from the environment and command line, applied over the file */
export interface SettingsOverrides {
  importsDir?: string;
  exportsDir?: string;
  concurrency?: number;
  logLevel?: string;
  logFormat?: string;
  logFile?: string;
}

type RawSection = Record<string, unknown>;

const TOP_LEVEL_KEYS = new Set([
  'importsDir', 'exportsDir', 'concurrency', 'excludePages', 'excludeSections',
  'caseSensitivePatterns', 'content', 'output', 'logging'
]);

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Settings files may use snake_case keys (exclude_pages, max_heading_level)
function camelKey(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match, ch: string) => ch.toUpperCase());
}

function normalizeKeys(section: RawSection): RawSection {
  const normalized: RawSection = {};
  for (const [key, value] of Object.entries(section)) {
    normalized[camelKey(key)] = value;
  }
  return normalized;
}

function readSection(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new SettingsError(`Invalid ${key}: expected a mapping`);
  }
  return normalizeKeys(value);
}

function readString(section: RawSection, key: string, fallback: string, label = key): string {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new SettingsError(`Invalid ${label}: expected a non-empty string`);
  }
  return value;
}

function readOptionalString(section: RawSection, key: string, label = key): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new SettingsError(`Invalid ${label}: expected a string`);
  }
  return value.trim() === '' ? undefined : value;
}

function readBoolean(section: RawSection, key: string, fallback: boolean, label = key): boolean {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    throw new SettingsError(`Invalid ${label}: expected true or false`);
  }
  return value;
}

function validateInteger(value: unknown, min: number, max: number, label: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new SettingsError(`Invalid ${label}: expected an integer between ${min} and ${max}`);
  }
  return value;
}

function readInteger(section: RawSection, key: string, fallback: number, min: number, max: number, label = key): number {
  const value = section[key];
  if (value === undefined || value === null) return fallback;
  return validateInteger(value, min, max, label);
}

function readStringList(section: RawSection, key: string, fallback: readonly string[], label = key): string[] {
  const value = section[key];
  if (value === undefined || value === null) return [...fallback];
  if (!Array.isArray(value)) {
    throw new SettingsError(`Invalid ${label}: expected a list of strings`);
  }
  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw new SettingsError(`Invalid ${label}[${index}]: expected a string`);
    }
    return item;
  });
}

function oneOf<T extends string>(value: string, allowed: readonly T[], label: string): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new SettingsError(`Invalid ${label}: "${value}" (expected one of ${allowed.join(', ')})`);
  }
  return match;
}

function buildContent(raw: RawSection): ContentSettings {
  const defaults = DEFAULT_SETTINGS.content;
  const fields = readStringList(raw, 'frontmatterFields', defaults.frontmatterFields, 'content.frontmatterFields')
    .map(field => oneOf(field, FRONTMATTER_FIELDS, 'content.frontmatterFields'));

  return {
    includeFrontmatter: readBoolean(raw, 'includeFrontmatter', defaults.includeFrontmatter, 'content.includeFrontmatter'),
    frontmatterFields: [...new Set(fields)],
    unknownMacroPolicy: oneOf(
      readString(raw, 'unknownMacroPolicy', defaults.unknownMacroPolicy, 'content.unknownMacroPolicy'),
      UNKNOWN_MACRO_POLICIES,
      'content.unknownMacroPolicy'
    )
  };
}

function buildOutput(raw: RawSection): OutputSettings {
  const defaults = DEFAULT_SETTINGS.output;
  const attachmentsDir = readString(raw, 'attachmentsDir', defaults.attachmentsDir, 'output.attachmentsDir');
  if (attachmentsDir.split(/[\\/]/).some(segment => segment === '..') || attachmentsDir.startsWith('/')) {
    throw new SettingsError('Invalid output.attachmentsDir: must be a relative path inside the output directory');
  }

  return {
    filenameStyle: oneOf(
      readString(raw, 'filenameStyle', defaults.filenameStyle, 'output.filenameStyle'),
      FILENAME_STYLES,
      'output.filenameStyle'
    ),
    preserveHierarchy: readBoolean(raw, 'preserveHierarchy', defaults.preserveHierarchy, 'output.preserveHierarchy'),
    maxHeadingLevel: readInteger(raw, 'maxHeadingLevel', defaults.maxHeadingLevel, 1, 6, 'output.maxHeadingLevel'),
    attachmentsDir: attachmentsDir.replace(/\\/g, '/').replace(/\/+$/, '')
  };
}

function parseLogLevel(value: string, label: string): LogLevel {
  return oneOf(value.toLowerCase(), LOG_LEVELS, label);
}

function parseLogFormat(value: string, label: string): LogFormat {
  return oneOf(value.toLowerCase(), LOG_FORMATS, label);
}

function buildLogging(raw: RawSection, overrides: SettingsOverrides): LoggingSettings {
  const defaults = DEFAULT_SETTINGS.logging;
  const level = overrides.logLevel ?? readString(raw, 'level', defaults.level, 'logging.level');
  const format = overrides.logFormat ?? readString(raw, 'format', defaults.format, 'logging.format');
  const file = overrides.logFile ?? readOptionalString(raw, 'file', 'logging.file');

  return {
    level: parseLogLevel(level, 'logging.level'),
    format: parseLogFormat(format, 'logging.format'),
    ...(file !== undefined ? { file } : {})
  };
}

/**
 * Validate raw settings (parsed YAML, or nothing) and apply overrides.
 * Every problem surfaces as a SettingsError naming the offending key.
 */
export function buildSettings(raw: unknown = {}, overrides: SettingsOverrides = {}): Settings {
  if (raw === null || raw === undefined) raw = {};
  if (!isRecord(raw)) {
    throw new SettingsError('Invalid settings: expected a mapping at the top level');
  }
  const top = normalizeKeys(raw);

  for (const key of Object.keys(top)) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      logger.warn('Ignoring unknown setting', { key });
    }
  }

  const concurrency = overrides.concurrency !== undefined
    ? validateInteger(overrides.concurrency, MIN_CONCURRENCY, MAX_CONCURRENCY, 'concurrency')
    : readInteger(top, 'concurrency', DEFAULT_SETTINGS.concurrency, MIN_CONCURRENCY, MAX_CONCURRENCY);

  return {
    importsDir: overrides.importsDir ?? readString(top, 'importsDir', DEFAULT_SETTINGS.importsDir),
    exportsDir: overrides.exportsDir ?? readString(top, 'exportsDir', DEFAULT_SETTINGS.exportsDir),
    concurrency,
    excludePages: readStringList(top, 'excludePages', DEFAULT_SETTINGS.excludePages),
    excludeSections: readStringList(top, 'excludeSections', DEFAULT_SETTINGS.excludeSections),
    caseSensitivePatterns: readBoolean(top, 'caseSensitivePatterns', DEFAULT_SETTINGS.caseSensitivePatterns),
    content: buildContent(readSection(top, 'content')),
    output: buildOutput(readSection(top, 'output')),
    logging: buildLogging(readSection(top, 'logging'), overrides)
  };
}

/**
 * Digest of the settings that shape page output. Directories, logging and
 * concurrency are left out: changing them never rebuilds a page.
 */
export function settingsDigest(settings: Pick<Settings, 'content' | 'output' | 'excludeSections' | 'caseSensitivePatterns'>): string {
  return digestParts([
    settings.content,
    settings.output,
    settings.excludeSections,
    settings.caseSensitivePatterns
  ]);
}
