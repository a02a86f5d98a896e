import { promises as fs } from 'fs';

import { ConfigurationError, ErrorFactory, getCurrentErrorContext, platformErrorCode } from '@tetherfs/errors';
import type { Logger } from '@tetherfs/logging';
import { load as yamlLoad } from 'js-yaml';
import { z } from 'zod';

import { TetherConfigSchema, type TetherConfig } from './schemas.js';
import { ConfigUtils, isRecord } from './utils.js';

/**
 * Options for configuration management
 */
export interface ConfigOptions {
  /** Logger instance for configuration operations */
  logger?: Logger;
  /** Whether to substitute `${VAR}` references from the environment */
  enableEnvSubstitution?: boolean;
  /** Default configuration to merge with loaded config */
  defaults?: Record<string, unknown>;
}

/**
 * Configuration validation error with the individual zod issues
 */
export class ConfigValidationError extends ConfigurationError {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message, getCurrentErrorContext({ operation: 'configuration' }), {
      code: 'CONFIG_VALIDATION_ERROR',
      data: { issues: errors.issues.length },
    });
  }

  getFormattedErrors(): string[] {
    return this.errors.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
  }
}

/**
 * YAML configuration loader with zod validation
 */
export class ConfigManager<T> {
  private config: T | null = null;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly configPath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly options: ConfigOptions = {}
  ) {
    this.logger = options.logger;
  }

  async loadConfig(): Promise<T> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf8');
    } catch (error) {
      const message =
        platformErrorCode(error) === 'ENOENT'
          ? `Configuration file not found: ${this.configPath}`
          : `Failed to read configuration file: ${this.configPath}`;
      this.logger?.error(message, error);
      throw ErrorFactory.configuration(message, { cause: error, data: { path: this.configPath } });
    }

    let parsed: unknown;
    try {
      parsed = yamlLoad(content);
    } catch (error) {
      throw ErrorFactory.configuration(`Invalid YAML in ${this.configPath}`, {
        cause: error,
        data: { path: this.configPath },
      });
    }

    this.config = this.validateAndTransform(parsed ?? {});
    this.logger?.info(`Configuration loaded from: ${this.configPath}`);
    return this.config;
  }

  /**
   * Apply env substitution and defaults, then validate
   */
  validateAndTransform(config: unknown): T {
    let processed = config;

    if (this.options.enableEnvSubstitution) {
      try {
        processed = ConfigUtils.processEnvVars(processed);
      } catch (error) {
        throw ErrorFactory.configuration(`Environment substitution failed for ${this.configPath}`, {
          cause: error,
        });
      }
    }

    if (this.options.defaults && isRecord(processed)) {
      processed = ConfigUtils.mergeConfigs(this.options.defaults, processed);
    }

    const result = this.schema.safeParse(processed);
    if (!result.success) {
      const error = new ConfigValidationError(
        `Configuration validation failed for ${this.configPath}`,
        result.error
      );
      this.logger?.error(`Validation errors: ${error.getFormattedErrors().join(', ')}`);
      throw error;
    }

    return result.data;
  }

  getConfig(): T {
    if (this.config === null) {
      throw ErrorFactory.configuration('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }
}

/**
 * Load the tetherfs configuration. Without a file every section takes its
 * defaults.
 */
export async function loadTetherConfig(
  configPath?: string,
  options: ConfigOptions = {}
): Promise<TetherConfig> {
  const manager = new ConfigManager(configPath ?? '<defaults>', TetherConfigSchema, {
    enableEnvSubstitution: true,
    ...options,
  });

  return configPath === undefined ? manager.validateAndTransform({}) : manager.loadConfig();
}

export { z } from 'zod';
export { ConfigUtils, isRecord } from './utils.js';
export * from './schemas.js';
