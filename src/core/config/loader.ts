import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes, SystemError } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.guidesmith/config.yaml';

export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default file doesn't exist; an explicitly
 * requested file that is missing is an error.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new ConfigError(
        ErrorCodes.CONFIG_INVALID,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath }
      );
    }
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath }
      );
    }
    throw error;
  }
}
