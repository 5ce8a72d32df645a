import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { createLogger } from '../core/Logger';
import { FinbridgeConfigSchema } from './schemas/config.schema';
import type { FinbridgeConfig } from './schemas/config.schema';

const logger = createLogger('ConfigLoader');

export const CONFIG_FILE_NAME = 'finbridge.yaml';
export const ENV_PREFIX = 'FINBRIDGE_';

type ConfigObject = Record<string, unknown>;

function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * ConfigLoader handles loading, validation, and environment variable overrides
 * for the YAML configuration.
 */
export class ConfigLoader {
  private configFolder: string;

  constructor(configFolder: string) {
    this.configFolder = configFolder;
  }

  /**
   * Load configuration from YAML file with environment variable overrides
   * @throws Error if configuration is invalid
   */
  load(): FinbridgeConfig {
    const yamlPath = path.join(this.configFolder, CONFIG_FILE_NAME);

    if (!fs.existsSync(yamlPath)) {
      this.handleMissingConfig(yamlPath);
    }

    logger.info(`Loading configuration from: ${yamlPath}`);
    const fileContent = fs.readFileSync(yamlPath, 'utf-8');
    let parsed: unknown;

    try {
      parsed = yaml.parse(fileContent);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to parse YAML configuration: ${message}`);
    }

    // An empty file parses to null
    const rawConfig = this.applyEnvOverrides(isConfigObject(parsed) ? parsed : {});

    const result = FinbridgeConfigSchema.safeParse(rawConfig);

    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
        .join('\n');
      throw new Error(`Configuration validation failed:\n${errors}`);
    }

    logger.info('Configuration loaded and validated successfully');
    this.logConfigSummary(result.data);

    return result.data;
  }

  /**
   * Write a template next to the expected path and exit so it can be edited
   */
  private handleMissingConfig(yamlPath: string): never {
    this.createFromTemplate(yamlPath);
    logger.info('');
    logger.info('='.repeat(60));
    logger.info('CONFIGURATION REQUIRED');
    logger.info('='.repeat(60));
    logger.info(`A template configuration has been created at: ${yamlPath}`);
    logger.info('Please set your Jellyfin host and API key, then restart.');
    logger.info('='.repeat(60));
    process.exit(0);
  }

  private createFromTemplate(yamlPath: string): void {
    const templatePath = path.join(__dirname, '../../config/finbridge.example.yaml');
    const fallbackTemplatePath = path.join(this.configFolder, 'finbridge.example.yaml');

    let templateContent: string;

    if (fs.existsSync(templatePath)) {
      templateContent = fs.readFileSync(templatePath, 'utf-8');
    } else if (fs.existsSync(fallbackTemplatePath)) {
      templateContent = fs.readFileSync(fallbackTemplatePath, 'utf-8');
    } else {
      templateContent = this.generateMinimalTemplate();
    }

    if (!fs.existsSync(this.configFolder)) {
      fs.mkdirSync(this.configFolder, { recursive: true });
    }

    fs.writeFileSync(yamlPath, templateContent, 'utf-8');
  }

  private generateMinimalTemplate(): string {
    return `# Finbridge Configuration

jellyfin:
  host: "localhost"
  port: 8096
  useSsl: false
  verifySsl: true
  apiKey: "your-api-key"

polling:
  intervalSeconds: 2
`;
  }

  // Mapping of lowercase env var keys to camelCase config keys
  private static readonly KEY_MAPPINGS: Record<string, string> = {
    apikey: 'apiKey',
    usessl: 'useSsl',
    verifyssl: 'verifySsl',
    timeoutms: 'timeoutMs',
    intervalseconds: 'intervalSeconds',
    failurethreshold: 'failureThreshold',
    maxbackoffseconds: 'maxBackoffSeconds',
    staletolerancepolls: 'staleTolerancePolls',
    refreshdelayms: 'refreshDelayMs',
  };

  /**
   * Apply FINBRIDGE_* environment variable overrides to configuration
   * Format: FINBRIDGE_SECTION_KEY (e.g., FINBRIDGE_JELLYFIN_APIKEY)
   */
  private applyEnvOverrides(config: ConfigObject): ConfigObject {
    const envVars = Object.entries(process.env).filter(([key]) => key.startsWith(ENV_PREFIX));

    for (const [key, value] of envVars) {
      if (!value) continue;

      const pathParts = key
        .substring(ENV_PREFIX.length)
        .toLowerCase()
        .split('_')
        .filter((part) => part.length > 0)
        .map((part) => ConfigLoader.KEY_MAPPINGS[part] || part);

      if (pathParts.length === 0) continue;

      this.setNestedValue(config, pathParts, this.parseEnvValue(value));
      logger.debug(`Applied env override: ${key}`);
    }

    return config;
  }

  /**
   * Set a nested value in an object using path parts, replacing non-object
   * intermediate values
   */
  private setNestedValue(obj: ConfigObject, pathParts: string[], value: unknown): void {
    let current = obj;

    for (const part of pathParts.slice(0, -1)) {
      const next = current[part];
      if (isConfigObject(next)) {
        current = next;
      } else {
        const created: ConfigObject = {};
        current[part] = created;
        current = created;
      }
    }

    current[pathParts[pathParts.length - 1]] = value;
  }

  /**
   * Parse environment variable value to appropriate type
   */
  private parseEnvValue(value: string): unknown {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;

    const num = Number(value);
    if (!isNaN(num) && value.trim() !== '') return num;

    return value;
  }

  /**
   * Log configuration summary (without sensitive data)
   */
  private logConfigSummary(config: FinbridgeConfig): void {
    const { jellyfin, polling, sensors, server } = config;
    const scheme = jellyfin.useSsl ? 'https' : 'http';
    logger.info('Configuration summary:');
    logger.info(`  Jellyfin: ${scheme}://${jellyfin.host}:${jellyfin.port} (verifySsl: ${jellyfin.verifySsl})`);
    logger.info(
      `  Polling: every ${polling.intervalSeconds}s, backoff after ${polling.failureThreshold} failures (max ${polling.maxBackoffSeconds}s)`
    );
    logger.info(`  Sensors: ${sensors.enabled ? `every ${sensors.intervalSeconds}s` : 'disabled'}`);
    logger.info(`  Control server: ${server.enabled ? `port ${server.port}` : 'disabled'}`);
  }
}
