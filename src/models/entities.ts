// Core domain interfaces

import type { LogFormat, LogLevel } from '../util/logger.js';
import type { ExportSource } from '../export/exportSource.js';

export interface Space {
  key: string;
  name: string;
}

export interface PageAttachment {
  fileName: string;
  sourcePath: string; // path inside the export source
}

export interface Page {
  id: string;
  title: string;
  parentId?: string;
  children: string[]; // ordered child ids
  rawContent: string; // storage format (XML exports) or HTML body (HTML exports)
  attachments: PageAttachment[];
  depth: number;
  sourcePath?: string; // HTML file relative to the export root
  position?: number;
  created?: string;
  modified?: string;
  labels: string[];
}

export type ExportFormat = 'xml' | 'html';

export interface Export {
  readonly format: ExportFormat;
  readonly space: Space;
  readonly pages: ReadonlyMap<string, Page>;
  readonly rootIds: readonly string[];
  readonly source: ExportSource;
}

export type UnknownMacroPolicy = 'comment' | 'strip' | 'preserve_text';
export type FilenameStyle = 'slugify' | 'preserve';
export type FrontmatterField = 'title' | 'id' | 'parent' | 'created' | 'modified' | 'labels';

export interface ContentSettings {
  includeFrontmatter: boolean;
  frontmatterFields: FrontmatterField[];
  unknownMacroPolicy: UnknownMacroPolicy;
}

export interface OutputSettings {
  filenameStyle: FilenameStyle;
  preserveHierarchy: boolean;
  maxHeadingLevel: number;
  attachmentsDir: string;
}

export interface LoggingSettings {
  level: LogLevel;
  format: LogFormat;
  file?: string;
}

export interface Settings {
  importsDir: string;
  exportsDir: string;
  concurrency: number;
  excludePages: string[];
  excludeSections: string[];
  caseSensitivePatterns: boolean;
  content: ContentSettings;
  output: OutputSettings;
  logging: LoggingSettings;
}
