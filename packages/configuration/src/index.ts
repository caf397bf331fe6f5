import { promises as fs } from 'fs';
import path from 'path';

import { ErrorFactory } from '@bucketferry/errors';
import { fileExists, ensureDirectory } from '@bucketferry/files';
import type { Logger } from '@bucketferry/logging';
import { load as yamlLoad, dump as yamlDump } from 'js-yaml';
import { z } from 'zod';

import { ConfigUtils } from './utils.js';

export interface ConfigOptions {
  logger?: Logger;
  /** Whether to create parent directories when saving */
  createDirs?: boolean;
  /** Whether to substitute `${VAR}` placeholders from the environment */
  enableEnvSubstitution?: boolean;
  yamlOptions?: {
    indent?: number;
    lineWidth?: number;
    noRefs?: boolean;
  };
}

/**
 * Configuration validation error with detailed information
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }

  getFormattedErrors(): string[] {
    return this.errors.issues.map(issue => {
      const issuePath = issue.path.join('.');
      return issuePath ? `${issuePath}: ${issue.message}` : issue.message;
    });
  }
}

/**
 * Generic configuration manager with TypeScript-first validation
 *
 * Provides:
 * - YAML file loading and saving
 * - Zod-based schema validation, with schema defaults for omitted fields
 * - Environment variable substitution
 * - Default configuration creation
 */
export class ConfigManager<T> {
  private config: T | null = null;
  private readonly logger: Logger | undefined;
  private readonly options: {
    createDirs: boolean;
    enableEnvSubstitution: boolean;
    yamlOptions: {
      indent: number;
      lineWidth: number;
      noRefs: boolean;
    };
  };

  constructor(
    private readonly configPath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: ConfigOptions = {}
  ) {
    this.logger = options.logger;
    this.options = {
      createDirs: options.createDirs ?? true,
      enableEnvSubstitution: options.enableEnvSubstitution ?? false,
      yamlOptions: {
        indent: 2,
        lineWidth: 120,
        noRefs: true,
        ...options.yamlOptions,
      },
    };
  }

  /**
   * Load configuration from file
   */
  async loadConfig(): Promise<T> {
    if (!(await fileExists(this.configPath))) {
      throw ErrorFactory.configuration(`Configuration file not found: ${this.configPath}`, {
        code: 'CONFIG_NOT_FOUND',
      });
    }

    let parsedConfig: unknown;
    try {
      const configContent = await fs.readFile(this.configPath, 'utf8');
      parsedConfig = yamlLoad(configContent) ?? {};
    } catch (error) {
      this.logger?.error(`Failed to read configuration: ${this.configPath}`, error);
      throw ErrorFactory.configuration(`Failed to read configuration file ${this.configPath}`, {
        code: 'CONFIG_UNREADABLE',
        ...(error instanceof Error && { cause: error }),
      });
    }

    const config = this.validateConfig(parsedConfig);
    this.logger?.info(`Configuration loaded from: ${this.configPath}`);
    return config;
  }

  /**
   * Load configuration from file, or the schema defaults when the file is missing
   */
  async loadOrDefault(): Promise<T> {
    if (await fileExists(this.configPath)) {
      return this.loadConfig();
    }

    this.logger?.warn(`Configuration file not found, using defaults: ${this.configPath}`);
    return this.validateConfig({});
  }

  /**
   * Validate a parsed document and make it the current configuration
   */
  validateConfig(rawConfig: unknown): T {
    let processed = rawConfig;
    if (this.options.enableEnvSubstitution) {
      try {
        processed = ConfigUtils.processEnvVars(rawConfig);
      } catch (error) {
        throw ErrorFactory.configuration(
          error instanceof Error ? error.message : String(error),
          { code: 'CONFIG_ENV_MISSING' }
        );
      }
    }

    const result = this.schema.safeParse(processed);

    if (!result.success) {
      const validationError = new ConfigValidationError(
        `Configuration validation failed for ${this.configPath}`,
        result.error
      );
      this.logger?.error(
        `Validation errors: ${validationError.getFormattedErrors().join(', ')}`
      );
      throw validationError;
    }

    this.config = result.data;
    return result.data;
  }

  /**
   * Save configuration to file as YAML
   */
  async saveConfig(config: unknown): Promise<void> {
    this.validateConfig(config);

    const yamlContent = yamlDump(config, this.options.yamlOptions);

    if (this.options.createDirs) {
      await ensureDirectory(path.dirname(this.configPath));
    }

    await fs.writeFile(this.configPath, yamlContent, 'utf8');
    this.logger?.info(`Configuration saved to: ${this.configPath}`);
  }

  /**
   * Get current configuration (must be loaded first)
   */
  getConfig(): T {
    if (this.config === null) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  async configExists(): Promise<boolean> {
    return fileExists(this.configPath);
  }

  getConfigPath(): string {
    return this.configPath;
  }
}

export { z } from 'zod';
export { ConfigUtils } from './utils.js';
