export * from './errors.js';
export * from './schemas/index.js';
export * from './metrics/index.js';
export * from './llm/index.js';
export * from './generator/index.js';
export * from './session/index.js';
export * from './export/index.js';
export {
  loadConfig,
  loadConfigFile,
  DEFAULT_CONFIG_FILE,
  DEFAULT_OUTPUT_DIR,
  type AssessorConfig,
  type ConfigOverrides,
  type LoadConfigOptions,
} from './config/index.js';
