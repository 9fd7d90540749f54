import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { LogLevel } from '../../domain/log-level.js';
import { NamespaceLevelFilter, ROOT_NAMESPACE } from '../../application/namespace-level-filter.js';
import { ConfigError, describeIssues } from './config-error.js';

const levelNameSchema = z.enum(['debug', 'info', 'warn', 'error', 'critical']);

/**
 * Namespace threshold configuration.
 *
 * - `defaultLevel` replaces the class-level default threshold.
 * - `root` is the root override (applies to every namespace without a
 *   more specific entry).
 * - `namespaces` maps dotted namespaces to thresholds.
 */
export const filterConfigSchema = z
  .object({
    defaultLevel: levelNameSchema.default('info'),
    root: levelNameSchema.optional(),
    namespaces: z.record(z.string(), levelNameSchema).default({}),
  })
  .strict();

export type FilterConfig = z.infer<typeof filterConfigSchema>;

/** Used when no configuration file exists. */
export const DEFAULT_FILTER_CONFIG: FilterConfig = {
  defaultLevel: 'info',
  namespaces: {},
};

/** Namespace written in LOG_FILTER_LEVELS to mean the root entry. */
const ROOT_TOKEN = '*';

const filterEnvSchema = z.object({
  LOG_FILTER_DEFAULT: levelNameSchema.optional(),
  LOG_FILTER_LEVELS: z.string().optional(),
});

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Parses and validates configuration text.
 * Blank content yields the defaults, like a missing file.
 */
export function parseFilterConfig(content: string, source = 'filter config'): FilterConfig {
  if (content.trim() === '') {
    return { ...DEFAULT_FILTER_CONFIG, namespaces: {} };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(source, `not valid JSON (${reason})`);
  }

  const parsed = filterConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(source, describeIssues(parsed.error.issues), parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Loads namespace thresholds from a JSON file.
 *
 * Defaults to `config/log-filter.json` under the working directory.
 * A missing file yields DEFAULT_FILTER_CONFIG; unreadable or invalid
 * content throws ConfigError.
 */
export function loadFilterConfig(configPath?: string): FilterConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'log-filter.json');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      return { ...DEFAULT_FILTER_CONFIG, namespaces: {} };
    }
    throw err;
  }

  return parseFilterConfig(content, filePath);
}

/**
 * Overlays environment settings on a base configuration.
 *
 * - `LOG_FILTER_DEFAULT`: level name replacing `defaultLevel`
 * - `LOG_FILTER_LEVELS`: comma-separated `namespace=level` pairs;
 *   the namespace `*` sets the root override
 */
export function filterConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  base: FilterConfig = DEFAULT_FILTER_CONFIG,
): FilterConfig {
  const parsed = filterEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('environment', describeIssues(parsed.error.issues), parsed.error.issues);
  }

  const config: FilterConfig = {
    defaultLevel: parsed.data.LOG_FILTER_DEFAULT ?? base.defaultLevel,
    root: base.root,
    namespaces: { ...base.namespaces },
  };

  const pairs = (parsed.data.LOG_FILTER_LEVELS ?? '')
    .split(',')
    .map((pair) => pair.trim())
    .filter((pair) => pair !== '');

  for (const pair of pairs) {
    const separator = pair.lastIndexOf('=');
    if (separator === -1) {
      throw new ConfigError('LOG_FILTER_LEVELS', `expected namespace=level, got "${pair}"`);
    }

    const namespace = pair.slice(0, separator).trim();
    const level = levelNameSchema.safeParse(pair.slice(separator + 1).trim());
    if (!level.success) {
      throw new ConfigError('LOG_FILTER_LEVELS', `unknown level in "${pair}"`, level.error.issues);
    }

    if (namespace === ROOT_TOKEN) {
      config.root = level.data;
    } else {
      config.namespaces[namespace] = level.data;
    }
  }

  return config;
}

/** Builds a NamespaceLevelFilter holding the configured thresholds. */
export function createNamespaceLevelFilter(config: FilterConfig = DEFAULT_FILTER_CONFIG): NamespaceLevelFilter {
  const filter = new NamespaceLevelFilter({
    defaultLevel: LogLevel.levelWithName(config.defaultLevel),
  });

  if (config.root !== undefined) {
    filter.setThreshold(ROOT_NAMESPACE, LogLevel.levelWithName(config.root));
  }
  for (const [namespace, level] of Object.entries(config.namespaces)) {
    filter.setThreshold(namespace, LogLevel.levelWithName(level));
  }

  return filter;
}
