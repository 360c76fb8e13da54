export { CrossPoster, uniquePlatforms, formatSummary } from './cross-poster.js';
export type {
  ClientProvider,
  CrossPosterOptions,
  PostOptions,
  PlatformOutcome,
  PostReport,
  PreviewEntry,
  ValidationEntry,
  ValidationReport,
} from './cross-poster.js';
export { parseArticle, parseArticleFile, resolveTitle } from './markdown-parser.js';
export { loadMarkdownFile, importFromDevTo, isRemoteSource, MARKDOWN_EXTENSIONS, MAX_SOURCE_BYTES } from './file-loader.js';
export {
  CONFIG_TEMPLATE,
  getConfigPath,
  loadConfig,
  readConfigFile,
  credentialsFor,
  initConfig,
  describeConfig,
} from './config.js';
export type { AppConfig, ConfigFile, ConfigSummaryEntry, CredentialSource, Env, ResolvedSecret } from './config.js';
export { Logger, type LogLevel } from './utils/logger.js';
