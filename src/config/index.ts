import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_MAX_TOKENS, DEFAULT_MODEL } from '../llm/anthropic-backend.js';
import { DEFAULT_NETWORK_RETRIES, DEFAULT_RETRY_DELAY_MS } from '../llm/client.js';
import { DEFAULT_MAX_ATTEMPTS } from '../generator/validated-generator.js';
import { validateDocument } from '../schemas/validator.js';

export const DEFAULT_CONFIG_FILE = 'rubricate.yaml';
export const DEFAULT_OUTPUT_DIR = 'assessments';

export interface AssessorConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  maxAttempts: number;
  networkRetries: number;
  retryDelayMs: number;
  outputDir: string;
}

export type ConfigOverrides = Partial<Omit<AssessorConfig, 'apiKey'>>;

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  cwd?: string;
}

const fileConfigSchema = z.strictObject({
  model: z.string().min(1).optional(),
  maxTokens: z.number().int().positive().optional(),
  maxAttempts: z.number().int().min(1).optional(),
  networkRetries: z.number().int().min(0).optional(),
  retryDelayMs: z.number().int().min(0).optional(),
  outputDir: z.string().min(1).optional(),
});

type FileConfig = z.infer<typeof fileConfigSchema>;

export function loadConfigFile(filePath: string): FileConfig {
  let data: unknown;
  try {
    data = yaml.load(readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(
      `Could not read config file ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
      { cause: e }
    );
  }

  // An empty file loads as undefined.
  const result = validateDocument(data ?? {}, fileConfigSchema);
  if (!result.valid) {
    throw new ConfigurationError(`Invalid config file ${filePath}: ${result.errors.join('; ')}`);
  }
  return result.value;
}

function resolveConfigFile(options: LoadConfigOptions): FileConfig {
  if (options.configPath) {
    if (!existsSync(options.configPath)) {
      throw new ConfigurationError(`Config file not found: ${options.configPath}`);
    }
    return loadConfigFile(options.configPath);
  }

  const defaultPath = join(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
  return existsSync(defaultPath) ? loadConfigFile(defaultPath) : {};
}

/**
 * Precedence, lowest first: built-in defaults, ANTHROPIC_MODEL, the YAML
 * config file, explicit overrides. The API key is only read from the
 * environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): AssessorConfig {
  const env = options.env ?? process.env;
  const apiKey = env.ANTHROPIC_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigurationError('ANTHROPIC_API_KEY not found in environment variables');
  }

  const file = resolveConfigFile(options);
  const overrides = options.overrides ?? {};

  return {
    apiKey,
    model: overrides.model ?? file.model ?? (env.ANTHROPIC_MODEL || DEFAULT_MODEL),
    maxTokens: overrides.maxTokens ?? file.maxTokens ?? DEFAULT_MAX_TOKENS,
    maxAttempts: overrides.maxAttempts ?? file.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    networkRetries: overrides.networkRetries ?? file.networkRetries ?? DEFAULT_NETWORK_RETRIES,
    retryDelayMs: overrides.retryDelayMs ?? file.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
    outputDir: overrides.outputDir ?? file.outputDir ?? DEFAULT_OUTPUT_DIR,
  };
}
