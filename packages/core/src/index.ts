export * from './types.js';
export * from './errors.js';
export type { Logger } from './logger.js';
export { silentLogger } from './logger.js';
export type { DocumentFormat, ParseOptions, ParsedAdr, SafeParseResult } from './parse.js';
export {
  detectFormat,
  extractSections,
  isLegacyStatus,
  numberFromFilename,
  parseAdr,
  parseAdrFile,
  parseDocument,
  safeParseAdr,
} from './parse.js';
export type { RenderOptions, SerializationMode } from './render.js';
export { renderAdr, renderStatusLink } from './render.js';
export type { FuzzyMatcherOptions, RankedMatch, TitleMatcher } from './match.js';
export { createFuzzyMatcher, rankMatches } from './match.js';
export type { AdrsConfig, ConfigSource, ResolveConfigOptions, ResolvedConfig } from './config.js';
export {
  CONFIG_ENV,
  CONFIG_FILE,
  DEFAULT_ADR_DIR,
  DIRECTORY_ENV,
  LEGACY_CONFIG_FILE,
  VCS_ROOT_MARKER,
  adrDirPath,
  defaultConfig,
  describeConfigSource,
  globalConfigPath,
  loadConfigFile,
  resolveConfig,
  saveConfig,
} from './config.js';
export type {
  InitOptions,
  OpenRepositoryOptions,
  RepositoryOptions,
  ScanResult,
  SkippedFile,
} from './repository.js';
export { DEFAULT_AMBIGUITY_RATIO, Repository, isRecordFilename } from './repository.js';
export type { CheckId, CheckOptions, Diagnostic, Severity } from './doctor.js';
export { DoctorReport, check, checkAdrs, compareSeverity } from './doctor.js';
