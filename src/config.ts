import { mkdirSync, readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { logger } from './utils/logger.js';

export const DEFAULT_EVENT_TYPES = [
  'DBS Programming Session',
  'Clinical Interview',
  'Lounge Activity',
  'Surprise',
  'VR-PAAT',
  'Sleep Period',
  'Meal',
  'Social',
  'Break',
  'IPG Charging',
  'CTM Disconnect',
  'Walk',
  'Snack',
  'Resting state',
  'Other',
] as const;

export const configSchema = z.object({
  outputDir: z.string().min(1).optional(),
  useDateFolder: z.boolean().default(true),
  recordSessionStart: z.boolean().default(false),
  server: z
    .object({
      host: z.string().min(1).default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(5001),
    })
    .default({}),
  eventTypes: z
    .array(z.string().trim().min(1))
    .min(1)
    .refine(types => new Set(types).size === types.length, 'eventTypes must be unique')
    .default([...DEFAULT_EVENT_TYPES]),
  studyIds: z.record(z.string().min(1), z.string().min(1)).default({}),
});

export type EventLoggerConfig = z.infer<typeof configSchema>;

export function getConfigDir(): string {
  return process.env.EVENT_LOGGER_HOME ?? join(homedir(), '.event-logger');
}

export function getConfigFile(): string {
  return join(getConfigDir(), 'config.json');
}

export function defaultConfig(): EventLoggerConfig {
  return configSchema.parse({});
}

export function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
    logger.debug(`Created config directory: ${dir}`);
  }
}

/**
 * Reads the config file, creating it with defaults on first use. Env overrides
 * (`PORT`, `EVENT_LOGGER_OUTPUT_DIR`) are applied on top but never saved.
 */
export function loadConfig(): EventLoggerConfig {
  ensureConfigDir();
  const file = getConfigFile();

  let config: EventLoggerConfig;
  if (!existsSync(file)) {
    config = defaultConfig();
    saveConfig(config);
  } else {
    config = parseConfigFile(file);
  }

  return applyEnvOverrides(config, process.env);
}

function parseConfigFile(file: string): EventLoggerConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    logger.warn(`Failed to read config (${err}), using defaults`);
    return defaultConfig();
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    logger.warn(`Invalid config in ${file} (${issues}), using defaults`);
    return defaultConfig();
  }
  return parsed.data;
}

export function applyEnvOverrides(config: EventLoggerConfig, env: NodeJS.ProcessEnv): EventLoggerConfig {
  const result: EventLoggerConfig = { ...config, server: { ...config.server } };

  if (env.EVENT_LOGGER_OUTPUT_DIR) {
    result.outputDir = env.EVENT_LOGGER_OUTPUT_DIR;
  }

  if (env.PORT) {
    const port = Number(env.PORT);
    if (Number.isInteger(port) && port > 0 && port <= 65535) {
      result.server.port = port;
    } else {
      logger.warn(`Ignoring invalid PORT "${env.PORT}"`);
    }
  }

  return result;
}

export function saveConfig(config: EventLoggerConfig): void {
  ensureConfigDir();
  writeFileSync(getConfigFile(), JSON.stringify(config, null, 2), { mode: 0o600 });
  logger.debug('Config saved');
}

/** Study id for a project id, matched by case-insensitive prefix. */
export function getStudyId(config: EventLoggerConfig, projectId: string): string {
  const upper = projectId.toUpperCase();
  for (const [prefix, studyId] of Object.entries(config.studyIds)) {
    if (upper.startsWith(prefix.toUpperCase())) {
      return studyId;
    }
  }
  return 'Unknown-Study';
}
