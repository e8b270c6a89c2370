export {
  loadSourceConfig,
  parseSourceConfig,
  readSourceConfigFile,
  mergeSourceConfigs,
  findConfiguredSource,
  type SourceConfigLocations,
} from './config-loader.js';
export {
  resolveSource,
  selectSourceName,
  buildSourceUrl,
  DEFAULT_HUGGINGFACE_ENDPOINT,
  OPTIONS_DIRECT_SOURCE,
  type SourceResolutionContext,
} from './resolver.js';
export { SOURCE_CONFIG_FILE_NAMES } from './types.js';
export type {
  ConfigLevel,
  SourceConfigFile,
  MergedSourceConfig,
  ResolutionLevel,
  ResolvedSource,
} from './types.js';
