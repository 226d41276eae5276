import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { DEFAULT_URL_TEMPLATE } from './hltb/assemble';

export const DEFAULT_CSV_PATH = 'hltb_dataset.csv';
export const DEFAULT_LOG_PATH = 'hltb.log';

interface ConfigErrorOptions extends ErrorOptions {
  issues?: string[];
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, { issues = [], ...options }: ConfigErrorOptions = {}) {
    super(message, options);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

const CountSchema = z.union([
  z.literal('*').transform(() => null),
  z.coerce.number({ invalid_type_error: 'count must be a number or "*"' }).int().nonnegative()
]);

export const CrawlConfigSchema = z.object({
  // null means unbounded: crawl until missThreshold consecutive ids yield nothing.
  count: CountSchema.default(1000),
  // A start id of 0 or below means no override: resume from the store.
  start: z.coerce
    .number()
    .int('start must be a whole number')
    .nullable()
    .default(null)
    .transform((value) => (value !== null && value > 0 ? value : null)),
  concurrency: z.coerce.number().int().positive('concurrency must be a positive number').default(8),
  missThreshold: z.coerce.number().int().positive('miss threshold must be a positive number').default(400),
  csvPath: z.string().trim().min(1).default(DEFAULT_CSV_PATH),
  logPath: z.string().trim().min(1).default(DEFAULT_LOG_PATH),
  urlTemplate: z.string().trim().includes('{id}', { message: 'url template must contain {id}' }).default(DEFAULT_URL_TEMPLATE)
});

export type CrawlConfigInput = z.input<typeof CrawlConfigSchema>;
export type CrawlConfig = z.output<typeof CrawlConfigSchema>;
export type CrawlConfigKey = keyof CrawlConfig;

const ConfigFileSchema = z.record(z.string(), z.unknown());

export function loadConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found at ${configPath}`);
  }
  const raw = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = /\.ya?ml$/i.test(configPath) ? YAML.parse(raw) : JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Could not parse config file ${configPath}`, { cause: error });
  }
  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(`Config file ${configPath} must contain an object`);
  }
  return result.data;
}

export interface ResolveConfigSources {
  flags?: Partial<Record<CrawlConfigKey, string>>;
  file?: Record<string, unknown>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/** Built-in defaults, then environment, then the config file, then flags. */
export function resolveConfig({ flags = {}, file = {}, env = process.env, cwd = process.cwd() }: ResolveConfigSources): CrawlConfig {
  const merged: Record<string, unknown> = {
    csvPath: env.HLTB_CSV_PATH || undefined,
    logPath: env.HLTB_LOG_PATH || undefined,
    ...file
  };
  for (const [key, value] of Object.entries(flags)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = CrawlConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigError(`Invalid run parameters: ${issues.join('; ')}`, { issues });
  }

  return {
    ...result.data,
    csvPath: resolvePath(result.data.csvPath, cwd),
    logPath: resolvePath(result.data.logPath, cwd)
  };
}

export function ensureWritable(filePath: string) {
  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.accessSync(dir, fs.constants.W_OK);
    if (fs.existsSync(filePath)) {
      fs.accessSync(filePath, fs.constants.W_OK);
    }
  } catch (error) {
    throw new ConfigError(`Output path is not writable: ${filePath}`, { cause: error });
  }
}

function resolvePath(candidate: string, cwd: string) {
  return path.isAbsolute(candidate) ? candidate : path.join(cwd, candidate);
}
