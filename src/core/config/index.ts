export { loadConfig, getDefaultConfig, DEFAULT_CONFIG_PATH } from './loader.js';
export { ConfigSchema } from './schema.js';
export type { Config, ToolConfig } from './schema.js';
