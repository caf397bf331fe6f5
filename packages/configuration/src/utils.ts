import { parseSize } from '@bucketferry/common';
import { z } from 'zod';

/**
 * Configuration value helpers shared by schemas
 */
export class ConfigUtils {
  /**
   * Replace `${VAR}` and `${VAR:-default}` placeholders in every string of a parsed document
   */
  static processEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    if (typeof value === 'string') {
      return ConfigUtils.substituteEnvVars(value, env);
    }

    if (Array.isArray(value)) {
      return value.map(item => ConfigUtils.processEnvVars(item, env));
    }

    if (value && typeof value === 'object') {
      return Object.fromEntries(
        Object.entries(value).map(([key, item]) => [key, ConfigUtils.processEnvVars(item, env)])
      );
    }

    return value;
  }

  static substituteEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
    return str.replace(/\$\{([^}]+)\}/g, (_match, varExpr: string) => {
      const [varName = '', defaultValue] = varExpr.split(':-');
      const envValue = env[varName.trim()];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue.trim();
      }

      throw new Error(`Required environment variable not set: ${varName}`);
    });
  }

  /**
   * Zod schema accepting a byte count or a size string such as "8MB"
   */
  static sizeTransformer() {
    return z.union([z.number().int().nonnegative(), z.string()]).transform((value, ctx) => {
      if (typeof value === 'number') {
        return value;
      }
      try {
        return parseSize(value);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: error instanceof Error ? error.message : String(error),
        });
        return z.NEVER;
      }
    });
  }
}
