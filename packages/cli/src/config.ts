import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { formatZodIssues } from '@commrecon/core';
import {
  ruleSetFileSchema,
  withRuleDefaults,
  type RuleSet,
} from '@commrecon/recon-engine';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const ENCODINGS = ['utf-8', 'utf8', 'utf16le', 'latin1', 'ascii'] as const;

/** Feed column mapping: canonical field name -> header in the source file */
const columnsSchema = z.record(z.string().min(1)).optional();

const fileFeedBase = z.object({
  filePath: z.string().min(1),
  encoding: z.enum(ENCODINGS).optional(),
  columns: columnsSchema,
});

const csvFeed = fileFeedBase
  .extend({
    type: z.literal('csv'),
    delimiter: z.string().min(1).optional(),
    headers: z.boolean().optional(),
    quote: z.string().optional(),
    skipEmptyLines: z.boolean().optional(),
  })
  .strict();

const jsonFeed = fileFeedBase
  .extend({
    type: z.literal('json'),
    recordsPath: z.string().optional(),
  })
  .strict();

const excelFeed = fileFeedBase
  .extend({
    type: z.literal('excel'),
    sheet: z.union([z.string().min(1), z.number().int().min(1)]).optional(),
    headers: z.boolean().optional(),
    startRow: z.number().int().min(1).optional(),
    startColumn: z.number().int().min(1).optional(),
  })
  .strict();

export const feedSourceSchema = z.discriminatedUnion('type', [csvFeed, jsonFeed, excelFeed]);

export type FeedSource = z.infer<typeof feedSourceSchema>;

export const outputSchema = z
  .object({
    format: z.enum(['xlsx', 'csv', 'json']),
    /** Workbook or JSON file; directory for csv */
    path: z.string().min(1),
  })
  .strict();

export type OutputConfig = z.infer<typeof outputSchema>;

export const engineSchema = z
  .object({
    maxConcurrency: z.number().int().min(1).max(64).optional(),
    onInvalidRecord: z.enum(['reject', 'fail']).optional(),
  })
  .strict();

export const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).optional(),
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    feeds: z
      .object({
        orders: feedSourceSchema,
        commissions: feedSourceSchema,
      })
      .strict(),
    /** Inline rule set, or the path of a rule set file */
    rules: z.union([z.string().min(1), z.record(z.unknown())]),
    output: outputSchema.optional(),
    engine: engineSchema.optional(),
    logging: loggingSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Config with the rule set loaded, defaults applied and paths resolved */
export interface ReconConfig {
  feeds: { orders: FeedSource; commissions: FeedSource };
  rules: RuleSet;
  output?: OutputConfig;
  engine: z.infer<typeof engineSchema>;
  logging: z.infer<typeof loggingSchema>;
}

export function formatZodError(err: z.ZodError, label = 'Invalid config.json'): string {
  return formatZodIssues(label, err);
}

async function readJsonFile(path: string, label: string, options?: EnvExpansionOptions): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read ${label} ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${label} ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return expandEnvVars(parsed, options);
}

function resolveFeed(feed: FeedSource, baseDir: string): FeedSource {
  return { ...feed, filePath: resolve(baseDir, feed.filePath) };
}

/**
 * Load and validate a config file. Relative paths resolve against the config file's directory.
 */
export async function loadConfig(
  configPath: string,
  options?: EnvExpansionOptions
): Promise<ReconConfig> {
  const absolutePath = resolve(process.cwd(), configPath);
  const baseDir = dirname(absolutePath);

  const result = configFileSchema.safeParse(await readJsonFile(absolutePath, 'config', options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  const config = result.data;

  let rules: unknown = config.rules;
  let rulesLabel = 'Invalid rules in config.json';
  if (typeof config.rules === 'string') {
    const rulesPath = resolve(baseDir, config.rules);
    rules = await readJsonFile(rulesPath, 'rule set', options);
    rulesLabel = `Invalid rule set ${rulesPath}`;
  }

  const parsedRules = ruleSetFileSchema.safeParse(rules);
  if (!parsedRules.success) {
    throw new ConfigError(formatZodError(parsedRules.error, rulesLabel));
  }

  return {
    feeds: {
      orders: resolveFeed(config.feeds.orders, baseDir),
      commissions: resolveFeed(config.feeds.commissions, baseDir),
    },
    rules: withRuleDefaults(parsedRules.data),
    output: config.output
      ? { ...config.output, path: resolve(baseDir, config.output.path) }
      : undefined,
    engine: config.engine ?? {},
    logging: config.logging ?? {},
  };
}
