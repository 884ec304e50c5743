import { promises as fs } from 'fs';
import { resolve } from 'path';
import { Ajv, type ValidateFunction } from 'ajv';
import type { JSONSchema7 } from 'json-schema';
import type { AppConfig, ConfigFile, ConfigValidationError } from '../types/config.js';
import { STATUS_VISIBILITIES } from '../types/mastodon.js';
import { isSupportedTimeZone } from '../utils/timezone.js';
import { DEFAULT_EMPTY_MESSAGE, DEFAULT_HEADING, isSupportedLocale } from '../utils/eventFormatter.js';

export const DEFAULT_CONFIG_PATH = 'config.json';

export const CONFIG_SCHEMA: JSONSchema7 = {
  type: 'object',
  properties: {
    instance: { type: 'string', minLength: 1 },
    webcal: { type: 'string', pattern: '^(https?|webcals?)://' },
    tokenFile: { type: 'string', minLength: 1 },
    maxEvents: { type: 'integer', minimum: 0 },
    floatingTimeZone: { type: 'string', minLength: 1 },
    displayTimeZone: { type: 'string', minLength: 1 },
    locale: { type: 'string', minLength: 1 },
    fetchTimeout: { type: 'integer', minimum: 1 },
    visibility: { type: 'string', enum: [...STATUS_VISIBILITIES] },
    heading: { type: 'string' },
    emptyMessage: { type: 'string', minLength: 1 }
  },
  required: ['instance', 'webcal'],
  additionalProperties: false
};

const DEFAULTS = {
  tokenFile: 'token.json',
  maxEvents: 5,
  locale: 'en',
  fetchTimeout: 30000,
  visibility: 'public',
  heading: DEFAULT_HEADING,
  emptyMessage: DEFAULT_EMPTY_MESSAGE
} satisfies Omit<AppConfig, 'instance' | 'webcal'>;

export class ConfigManager {
  private readonly configPath: string;
  private readonly validate: ValidateFunction<ConfigFile>;
  private config: AppConfig | null = null;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = resolve(configPath);
    const ajv = new Ajv({ allErrors: true, verbose: true });
    this.validate = ajv.compile<ConfigFile>(CONFIG_SCHEMA);
  }

  /**
   * Load and validate configuration from disk
   */
  async loadConfig(): Promise<AppConfig> {
    let configData: string;
    try {
      configData = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new Error(`Failed to load configuration: ${this.configPath} does not exist`);
      }
      throw new Error(`Failed to load configuration: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(configData);
    } catch (error) {
      throw new Error(`Failed to load configuration: ${this.configPath} is not valid JSON (${error instanceof Error ? error.message : 'parse error'})`);
    }

    const validationErrors = this.validateConfig(parsed);
    if (validationErrors.length > 0 || !this.validate(parsed)) {
      throw new Error(`Failed to load configuration: ${validationErrors.map(e => `${e.field} ${e.message}`).join(', ')}`);
    }

    this.config = { ...DEFAULTS, ...parsed };
    console.error(`Configuration loaded from: ${this.configPath}`);
    console.error(`Instance: ${this.config.instance}`);
    return this.getConfig();
  }

  /**
   * Get current configuration
   */
  getConfig(): AppConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return { ...this.config }; // Return a copy to prevent external mutations
  }

  /**
   * Validate a configuration object against the schema, the zone names luxon knows and the locales Intl supports
   */
  validateConfig(config: unknown): ConfigValidationError[] {
    if (!this.validate(config)) {
      return (this.validate.errors ?? []).map(error => ({
        field: error.instancePath ? error.instancePath.substring(1).replace(/\//g, '.') : 'root',
        message: error.message ?? 'is invalid',
        value: error.data
      }));
    }

    const errors: ConfigValidationError[] = [];
    for (const field of ['floatingTimeZone', 'displayTimeZone'] as const) {
      const zone = config[field];
      if (zone !== undefined && !isSupportedTimeZone(zone)) {
        errors.push({ field, message: 'must be a known IANA time zone', value: zone });
      }
    }
    if (config.locale !== undefined && !isSupportedLocale(config.locale)) {
      errors.push({ field: 'locale', message: 'must be a supported BCP 47 locale tag', value: config.locale });
    }
    return errors;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
