import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const rootPath = path.join(__dirname, '..');

// Helper for non-negative integer settings given as env strings
const int = (defaultValue: string) =>
  z.string()
   .regex(/^\d+$/, 'Expected a non-negative integer')
   .default(defaultValue)
   .transform(Number);

export const logLevels = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = typeof logLevels[number];

// Configuration Schema
const configSchema = z.object({
  // Files
  urlFile: z.string().min(1).default('urls.txt'),
  outputFile: z.string().min(1).default('ev_charger_data.csv'),

  // Politeness throttle between URLs
  requestDelayMs: int('2000'),

  // Page fetcher
  http: z.object({
    timeoutMs: int('10000'),
    maxRetries: int('1'),
    retryDelayMs: int('5000'),
  }),

  logLevel: z.enum(logLevels).default('info'),

  // Paths (empty LOG_DIR disables file logs)
  paths: z.object({
    logs: z.string().default(path.join(rootPath, 'logs')),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodFormattedError<z.input<typeof configSchema>>) {
    super('Invalid configuration');
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    urlFile: env.URL_FILE,
    outputFile: env.OUTPUT_FILE,
    requestDelayMs: env.REQUEST_DELAY_MS,

    http: {
      timeoutMs: env.REQUEST_TIMEOUT_MS,
      maxRetries: env.MAX_RETRIES,
      retryDelayMs: env.RETRY_DELAY_MS,
    },

    logLevel: env.LOG_LEVEL,

    paths: {
      logs: env.LOG_DIR,
    },
  };

  const parsed = configSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.format());
  }
  return parsed.data;
}
