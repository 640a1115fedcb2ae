/**
 * Configuration validator
 * Turns raw config entries into a typed ExporterConfig, collecting every problem
 */

import { Credential, ExtractionConfig } from '../engine/interfaces';
import { ConfigError } from '../errors';

export type RawConfig = Record<string, unknown>;

export interface ExporterConfig extends ExtractionConfig {
  url: string;
  account: string;
  apiUser: string;
  credential: Credential;
  proxy?: string;
  outputFile: string;
  continueOnError: boolean;
  quoteFields: boolean;
  requestTimeoutMs?: number;
}

export interface ConfigValidationError {
  field: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: ExporterConfig;
}

const TRUE_VALUES = ['true', 'yes', '1'];
const FALSE_VALUES = ['false', 'no', '0'];

export class ConfigValidator {
  /**
   * Validate raw config entries
   */
  validate(raw: RawConfig): ConfigValidationResult {
    const errors: ConfigValidationError[] = [];

    const url = this.requireString(raw, 'appd_url', errors);
    const account = this.requireString(raw, 'appd_account', errors);
    const apiUser = this.requireString(raw, 'appd_api_user', errors);
    const password = this.optionalString(raw, 'appd_api_password', errors);
    const secret = this.optionalString(raw, 'appd_api_secret', errors);
    const proxy = this.optionalString(raw, 'appd_proxy', errors);
    const applicationNames = this.requirePattern(raw, 'application_names', errors);
    const backendType = this.requirePattern(raw, 'backend_type', errors);
    const skipThreadTasks = this.readBoolean(raw, 'skip_thread_tasks', errors, true);
    const outputFile = this.requireString(raw, 'output_file', errors);
    const continueOnError = this.readBoolean(raw, 'continue_on_error', errors, false);
    const quoteFields = this.readBoolean(raw, 'quote_fields', errors, false);
    const requestTimeoutMs = this.readPositiveInteger(raw, 'request_timeout_ms', errors);

    if (url !== undefined) {
      this.validateUrl('appd_url', url, errors);
    }
    if (proxy !== undefined) {
      this.validateUrl('appd_proxy', proxy, errors);
    }

    let credential: Credential | undefined;
    if (secret) {
      credential = { kind: 'oauth', secret };
    } else if (password) {
      credential = { kind: 'password', password };
    } else {
      errors.push({
        field: 'appd_api_password',
        message: 'Missing required config entry: appd_api_password or appd_api_secret',
      });
    }

    if (
      errors.length > 0 ||
      url === undefined ||
      account === undefined ||
      apiUser === undefined ||
      credential === undefined ||
      applicationNames === undefined ||
      backendType === undefined ||
      skipThreadTasks === undefined ||
      outputFile === undefined
    ) {
      return { valid: false, errors };
    }

    return {
      valid: true,
      errors,
      config: {
        url,
        account,
        apiUser,
        credential,
        proxy,
        applicationNames,
        backendType,
        skipThreadTasks,
        outputFile,
        continueOnError: continueOnError ?? false,
        quoteFields: quoteFields ?? false,
        requestTimeoutMs,
      },
    };
  }

  /**
   * Validate and return the config, or throw a ConfigError listing every problem
   */
  resolve(raw: RawConfig): ExporterConfig {
    const result = this.validate(raw);
    if (!result.config) {
      throw new ConfigError(result.errors.map(error => error.message));
    }
    return result.config;
  }

  private optionalString(
    raw: RawConfig,
    field: string,
    errors: ConfigValidationError[]
  ): string | undefined {
    const value = raw[field];

    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value === 'number') {
      return String(value);
    }
    if (typeof value !== 'string') {
      errors.push({ field, message: `Config entry ${field} must be a string` });
      return undefined;
    }

    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }

  private requireString(
    raw: RawConfig,
    field: string,
    errors: ConfigValidationError[]
  ): string | undefined {
    const before = errors.length;
    const value = this.optionalString(raw, field, errors);
    if (value === undefined && errors.length === before) {
      errors.push({ field, message: `Missing required config entry: ${field}` });
    }
    return value;
  }

  private requirePattern(
    raw: RawConfig,
    field: string,
    errors: ConfigValidationError[]
  ): string | undefined {
    const value = this.requireString(raw, field, errors);
    if (value === undefined) {
      return undefined;
    }

    try {
      new RegExp(value);
      return value;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      errors.push({ field, message: `Config entry ${field} is not a valid regex: ${reason}` });
      return undefined;
    }
  }

  private readBoolean(
    raw: RawConfig,
    field: string,
    errors: ConfigValidationError[],
    required: boolean
  ): boolean | undefined {
    const value = raw[field];

    if (typeof value === 'boolean') {
      return value;
    }
    if (value === undefined || value === null || value === '') {
      if (required) {
        errors.push({ field, message: `Missing required config entry: ${field}` });
      }
      return undefined;
    }

    const normalized = String(value).trim().toLowerCase();
    if (TRUE_VALUES.includes(normalized)) {
      return true;
    }
    if (FALSE_VALUES.includes(normalized)) {
      return false;
    }

    errors.push({ field, message: `Config entry ${field} must be true or false` });
    return undefined;
  }

  private readPositiveInteger(
    raw: RawConfig,
    field: string,
    errors: ConfigValidationError[]
  ): number | undefined {
    const value = raw[field];
    if (value === undefined || value === null || value === '') {
      return undefined;
    }

    const parsed = typeof value === 'number' ? value : Number(String(value).trim());
    if (!Number.isInteger(parsed) || parsed <= 0) {
      errors.push({ field, message: `Config entry ${field} must be a positive integer` });
      return undefined;
    }
    return parsed;
  }

  private validateUrl(field: string, value: string, errors: ConfigValidationError[]): void {
    let protocol: string;
    try {
      protocol = new URL(value).protocol;
    } catch {
      errors.push({ field, message: `Config entry ${field} is not a valid URL: ${value}` });
      return;
    }

    if (protocol !== 'http:' && protocol !== 'https:') {
      errors.push({ field, message: `Config entry ${field} must use http or https: ${value}` });
    }
  }
}

/**
 * Factory function to create a config validator
 */
export function createConfigValidator(): ConfigValidator {
  return new ConfigValidator();
}
