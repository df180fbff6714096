/**
 * Settings resolution for the CLI: defaults < settings file < environment
 * < command-line flags.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import type { Settings } from '../models/entities.js';
import { SettingsError, errorMessage } from '../core/errors.js';
import { buildSettings, type SettingsOverrides } from '../util/config.js';
import { logger } from '../util/logger.js';

export const DEFAULT_SETTINGS_FILE = 'settings.yaml';

export interface CLIOptions {
  config?: string;
  out?: string;
  force?: boolean;
  dryRun?: boolean;
  concurrency?: string;
  logLevel?: string;
  logFormat?: string;
}

export interface RawEnv {
  LOG_LEVEL?: string;
  LOG_FORMAT?: string;
}

export interface LoadedSettings {
  settings: Settings;
  /** Settings file that was read, if any */
  configPath?: string;
}

function parseConcurrency(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const concurrency = Number(value);
  if (!Number.isInteger(concurrency)) {
    throw new SettingsError(`Invalid concurrency: "${value}" is not an integer`);
  }
  return concurrency;
}

/**
 * Reads and parses a settings file. An explicit path must exist; without
 * one, settings.yaml in the working directory is used when present.
 */
export async function loadSettingsFile(configPath: string | undefined, cwd: string): Promise<{ raw: unknown; path?: string }> {
  const path = configPath !== undefined ? resolve(cwd, configPath) : join(cwd, DEFAULT_SETTINGS_FILE);

  if (!existsSync(path)) {
    if (configPath !== undefined) {
      throw new SettingsError(`Config file not found: ${configPath}`);
    }
    return { raw: {} };
  }

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new SettingsError(`Cannot read config file ${path}: ${errorMessage(error)}`, { cause: error });
  }

  try {
    return { raw: parseYaml(content) ?? {}, path };
  } catch (error) {
    throw new SettingsError(`Invalid YAML in ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

export async function loadSettings(
  options: CLIOptions,
  env: RawEnv = process.env,
  cwd: string = process.cwd()
): Promise<LoadedSettings> {
  const file = await loadSettingsFile(options.config, cwd);

  const overrides: SettingsOverrides = {
    concurrency: parseConcurrency(options.concurrency),
    logLevel: options.logLevel ?? env.LOG_LEVEL,
    logFormat: options.logFormat ?? env.LOG_FORMAT
  };

  const settings = buildSettings(file.raw, dropUndefined(overrides));

  logger.debug('Settings loaded', {
    configPath: file.path,
    concurrency: settings.concurrency,
    excludePages: settings.excludePages.length,
    excludeSections: settings.excludeSections.length
  });

  return file.path !== undefined ? { settings, configPath: file.path } : { settings };
}

function dropUndefined(overrides: SettingsOverrides): SettingsOverrides {
  const result: SettingsOverrides = {};
  if (overrides.concurrency !== undefined) result.concurrency = overrides.concurrency;
  if (overrides.logLevel !== undefined && overrides.logLevel !== '') result.logLevel = overrides.logLevel;
  if (overrides.logFormat !== undefined && overrides.logFormat !== '') result.logFormat = overrides.logFormat;
  return result;
}
