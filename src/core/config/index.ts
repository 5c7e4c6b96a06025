// src/core/config/index.ts
// Configuration system exports

export {
  type ReaderConfig,
  type ReplConfig,
  type LispReaderConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_READER_CONFIG,
  DEFAULT_REPL_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  parseCommentMode,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
