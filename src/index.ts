// Library entry point

export * from './models/entities.js';
export * from './models/markup.js';
export * from './core/errors.js';
export * from './core/report.js';
export * from './core/exitStatus.js';
export { BuildRunner, pageHash, structureDigest, type BuildRunnerOptions, type BuildStatus } from './core/buildRunner.js';
export { parseExport, parseExportSource } from './export/exportParser.js';
export { openExportSource, discoverExports, type ExportSource, type DiscoveredExport } from './export/exportSource.js';
export { preOrder, titlePath } from './export/pageTree.js';
export { parseStorage } from './transform/storageParser.js';
export { MarkdownTransformer, convertPage, type ConversionResult, type ResolvedAttachment, type SectionRules } from './transform/markdownTransformer.js';
export { filter, filterExport, PageFilter, type FilteredExport } from './services/pageFilter.js';
export { filterSections, type SectionFilterResult } from './services/sectionFilter.js';
export { compilePatterns, matchesPattern } from './util/patterns.js';
export { planOutputPaths } from './fs/slugCollision.js';
export { BuildCache, CACHE_FILE, type CacheEntry, type CacheRecord } from './fs/buildCache.js';
export { FileSystemWriter, type OutputWriter } from './fs/outputWriter.js';
export { DEFAULT_SETTINGS, buildSettings, settingsDigest, type SettingsOverrides } from './util/config.js';
export { slugify, preserveFilename } from './util/slugify.js';
export { Logger, logger } from './util/logger.js';
