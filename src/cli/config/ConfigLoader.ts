/**
 * Config Loader - reads the exporter configuration file
 *
 * YAML and JSON files are parsed with js-yaml. Any other file is read as
 * `key=value` lines, the format of shell-style config files:
 *
 * ```
 * # controller
 * appd_url="https://controller.example.com"
 * export appd_account=customer1
 * ```
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigError } from '../../core/errors';
import { RawConfig } from '../../core/validators/ConfigValidator';

const YAML_EXTENSIONS = ['.yaml', '.yml', '.json'];

/**
 * Secrets that may come from the environment instead of the file
 */
export const ENV_FALLBACKS: Record<string, string> = {
  appd_api_password: 'APPD_API_PASSWORD',
  appd_api_secret: 'APPD_API_SECRET',
};

export async function loadConfigFile(filePath: string): Promise<RawConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch {
    throw new ConfigError([`${filePath} is not readable`]);
  }

  if (YAML_EXTENSIONS.includes(path.extname(filePath).toLowerCase())) {
    return parseYamlConfig(content, filePath);
  }
  return parseKeyValueConfig(content, filePath);
}

export function parseYamlConfig(content: string, filePath: string): RawConfig {
  let doc: unknown;
  try {
    doc = yaml.load(content);
  } catch (error) {
    throw new ConfigError([`Invalid YAML in ${filePath}: ${error}`]);
  }

  if (doc === undefined || doc === null) {
    return {};
  }
  if (typeof doc !== 'object' || Array.isArray(doc)) {
    throw new ConfigError([`${filePath} must contain a mapping of config entries`]);
  }
  return Object.fromEntries(Object.entries(doc));
}

export function parseKeyValueConfig(content: string, filePath: string): RawConfig {
  const config: RawConfig = {};
  const problems: string[] = [];

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim().replace(/^export\s+/, '');
    if (line === '' || line.startsWith('#')) {
      return;
    }

    const eq = line.indexOf('=');
    const key = eq > 0 ? line.slice(0, eq).trim() : '';
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
      problems.push(`${filePath}:${index + 1}: expected key=value`);
      return;
    }

    config[key] = unquote(line.slice(eq + 1).trim());
  });

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}

/**
 * Strip shell-style quotes from a value; unquoted values drop trailing comments
 */
export function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(["\\$`])/g, '$1');
  }
  return value.replace(/\s+#.*$/, '');
}

/**
 * Fill secrets missing from the file with their environment variables
 */
export function applyEnvFallbacks(config: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const merged: RawConfig = { ...config };

  for (const [key, variable] of Object.entries(ENV_FALLBACKS)) {
    const value = env[variable];
    if ((merged[key] === undefined || merged[key] === '') && value) {
      merged[key] = value;
    }
  }

  return merged;
}
