import { ConfigManager, ConfigValidationError } from '@bucketferry/configuration';
import { ErrorFactory } from '@bucketferry/errors';
import type { Logger } from '@bucketferry/logging';

import { AppConfigSchema, type AppConfig, type AppConfigInput } from './schema.js';

export const DEFAULT_CONFIG_PATH = 'config.yaml';

/**
 * Document written by `bucketferry init`
 */
export const DEFAULT_CONFIG_DOCUMENT: AppConfigInput = {
  ignore_pattern: {
    starts_with: [],
    ends_with: [],
    contains: [],
  },
  target_path: './s3_download',
  delete_after_download: false,
  concurrency: 1,
  segment_size: '8MB',
  retry: {
    max_attempts: 5,
    base_delay_ms: 1000,
    max_delay_ms: 30000,
  },
  logging: {
    level: 'INFO',
    format: 'text',
  },
};

function createManager(configPath: string, logger?: Logger): ConfigManager<AppConfig> {
  return new ConfigManager(configPath, AppConfigSchema, {
    ...(logger && { logger }),
    enableEnvSubstitution: true,
  });
}

/**
 * Load the application configuration. A missing file yields the defaults;
 * an unreadable or invalid one is a ConfigurationError.
 */
export async function loadAppConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  logger?: Logger
): Promise<AppConfig> {
  try {
    return await createManager(configPath, logger).loadOrDefault();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      throw ErrorFactory.configuration(
        `Invalid configuration in ${configPath}: ${error.getFormattedErrors().join('; ')}`,
        { code: 'CONFIG_INVALID', cause: error }
      );
    }
    throw error;
  }
}

/**
 * Write the default configuration, refusing to replace an existing file unless forced
 */
export async function writeDefaultConfig(
  outputPath: string,
  options: { force?: boolean; logger?: Logger } = {}
): Promise<void> {
  const manager = createManager(outputPath, options.logger);

  if (!options.force && (await manager.configExists())) {
    throw ErrorFactory.configuration(`Configuration file already exists: ${outputPath}`, {
      code: 'CONFIG_EXISTS',
    });
  }

  await manager.saveConfig(DEFAULT_CONFIG_DOCUMENT);
}
