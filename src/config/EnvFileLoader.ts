import { readFileSync } from 'fs';
import { hasErrorCode, isError } from '../utils/errors';
import { ConfigError } from './errors';

export type Environment = Record<string, string>;

export interface EnvFileOptions {
  /** Ambient environment the file is applied over. It is copied, never mutated. */
  env?: NodeJS.ProcessEnv | Environment;

  /** Let file values replace keys that already exist in the ambient environment */
  override?: boolean;
}

export interface EnvFileResult {
  /** Every value the file defined, after quote stripping and expansion */
  loaded: Environment;

  /** Ambient environment with the file's values applied */
  environment: Environment;
}

const VARIABLE_REFERENCE = /\$\{([^}]+)\}/g;

/**
 * Cut an inline `#` comment unless it sits inside a matching quote pair
 */
export function stripInlineComment(value: string): string {
  let quote = '';

  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '"' || ch === "'") {
      if (!quote) {
        quote = ch;
      } else if (quote === ch) {
        quote = '';
      }
    } else if (ch === '#' && !quote) {
      return value.substring(0, i).trimEnd();
    }
  }

  return value;
}

function stripQuotes(value: string): string {
  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Single-pass `${NAME}` substitution: same-file value, then ambient value, then empty
 */
export function expandVariables(value: string, loaded: Environment, ambient: Environment): string {
  return value.replace(VARIABLE_REFERENCE, (_match, name: string) => {
    if (Object.prototype.hasOwnProperty.call(loaded, name)) {
      return loaded[name];
    }
    if (Object.prototype.hasOwnProperty.call(ambient, name)) {
      return ambient[name];
    }
    return '';
  });
}

function copyEnvironment(env: NodeJS.ProcessEnv | Environment): Environment {
  const copy: Environment = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      copy[key] = value;
    }
  }
  return copy;
}

/**
 * Parse env-file content against an ambient environment
 */
export function parseEnvContent(content: string, options: EnvFileOptions = {}): EnvFileResult {
  const environment = copyEnvironment(options.env ?? process.env);
  const loaded: Environment = {};

  for (const raw of content.split(/\r?\n/)) {
    let line = raw.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }
    if (line.startsWith('export ')) {
      line = line.substring('export '.length).trimStart();
    }

    const separator = line.indexOf('=');
    if (separator === -1) {
      continue;
    }

    const key = line.substring(0, separator).trim();
    if (!key) {
      continue;
    }

    const rawValue = stripInlineComment(line.substring(separator + 1).trim()).trim();
    const value = expandVariables(stripQuotes(rawValue), loaded, environment);

    if (!Object.prototype.hasOwnProperty.call(environment, key) || options.override) {
      environment[key] = value;
    }
    loaded[key] = value;
  }

  return { loaded, environment };
}

/**
 * Read and parse an env file
 * @throws ConfigError when the file does not exist or cannot be read
 */
export function loadEnvFile(filePath: string, options: EnvFileOptions = {}): EnvFileResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason =
      hasErrorCode(error, 'ENOENT')
        ? 'Configuration file not found'
        : 'Configuration file could not be read';
    throw new ConfigError(
      `${reason}: ${filePath}`,
      undefined,
      isError(error) ? error : undefined
    );
  }

  return parseEnvContent(content, options);
}
