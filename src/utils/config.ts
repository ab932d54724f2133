import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from './error-handler.js';
import type { AppConfig } from '../types/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CONFIG_PATH = join(__dirname, '../..', 'config', 'default.json');

const keywordList = z.array(z.string().min(1)).min(1);

const configSchema = z.object({
  mail: z.object({
    sender: z.string(),
    password: z.string(),
    defaultRecipients: z.array(z.string()),
    signature: z.string(),
    sendConfirmation: z.boolean(),
  }),
  smtp: z.object({
    host: z.string().min(1),
    port: z.number().int().positive(),
    retryAttempts: z.number().int().min(0),
    retryDelayMs: z.number().int().min(0),
  }),
  source: z.object({
    documentId: z.string(),
    cachePath: z.string().min(1),
    sheetName: z.string().optional(),
    retryAttempts: z.number().int().min(0),
    retryDelayMs: z.number().int().min(0),
  }),
  table: z.object({
    maxHeaderScan: z.number().int().positive(),
    dayFirst: z.boolean(),
    headerTokens: keywordList,
    columnKeywords: z.object({
      expiry: keywordList,
      email: keywordList,
      name: keywordList,
      file: keywordList,
      path: keywordList,
      service: keywordList,
      business: keywordList,
    }),
  }),
  reminders: z.object({
    preReminderDays: z.number().int().min(1),
    dueToday: z.enum(['once', 'windows']),
    eveningStartHour: z.number().int().min(0).max(23),
    notifyExpiredWithinDays: z.number().int().min(0),
  }),
  ledger: z.object({
    path: z.string().min(1),
    retentionDays: z.number().int().min(0),
  }),
  logging: z.object({
    level: z.string(),
    format: z.string(),
    file: z.string().optional(),
  }),
}) satisfies z.ZodType<AppConfig>;

type RawConfig = z.input<typeof configSchema>;

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function applyEnvOverrides(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const config = structuredClone(raw);

  if (env.APP_EMAIL) config.mail.sender = env.APP_EMAIL.trim();
  if (env.APP_PASSWORD) config.mail.password = env.APP_PASSWORD.trim();
  if (env.RECIPIENT_DEFAULT) config.mail.defaultRecipients = splitList(env.RECIPIENT_DEFAULT);
  if (env.SEND_CONFIRMATION) config.mail.sendConfirmation = env.SEND_CONFIRMATION === 'true';
  if (env.SMTP_HOST) config.smtp.host = env.SMTP_HOST;
  if (env.SMTP_PORT) config.smtp.port = parseInt(env.SMTP_PORT, 10);
  if (env.SOURCE_DOCUMENT_ID) config.source.documentId = env.SOURCE_DOCUMENT_ID.trim();
  if (env.DOWNLOAD_PATH) config.source.cachePath = env.DOWNLOAD_PATH;
  if (env.SHEET_NAME) config.source.sheetName = env.SHEET_NAME;
  if (env.DAY_FIRST) config.table.dayFirst = env.DAY_FIRST !== 'false';
  if (env.DUE_TODAY_POLICY === 'once' || env.DUE_TODAY_POLICY === 'windows') {
    config.reminders.dueToday = env.DUE_TODAY_POLICY;
  }
  if (env.LEDGER_PATH) config.ledger.path = env.LEDGER_PATH;
  if (env.LOG_LEVEL) config.logging.level = env.LOG_LEVEL;
  if (env.LOG_FORMAT) config.logging.format = env.LOG_FORMAT;
  if (env.LOG_FILE) config.logging.file = env.LOG_FILE;

  // Without explicit recipients, reminders go back to the sender
  if (config.mail.defaultRecipients.length === 0 && config.mail.sender) {
    config.mail.defaultRecipients = [config.mail.sender];
  }

  return config;
}

/**
 * Build the run configuration from the JSON defaults plus environment overrides.
 * The result is passed explicitly into every pipeline component.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  configPath: string = DEFAULT_CONFIG_PATH
): AppConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to load config from ${configPath}: ${error}`, { configPath });
  }

  const base = configSchema.safeParse(raw);
  if (!base.success) {
    throw new ConfigError(`Invalid config in ${configPath}: ${base.error.message}`, { configPath });
  }

  const result = configSchema.safeParse(applyEnvOverrides(base.data, env));
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.error.message}`, {
      issues: result.error.issues.map((issue) => issue.path.join('.')),
    });
  }
  return result.data;
}

/** Warnings about settings the run can proceed without */
export function describeConfigGaps(config: AppConfig): string[] {
  const gaps: string[] = [];
  if (!config.mail.sender) gaps.push('APP_EMAIL is not set; emails will not be sent');
  if (!config.mail.password) gaps.push('APP_PASSWORD is not set; emails will not be sent');
  if (config.mail.defaultRecipients.length === 0) {
    gaps.push('No default recipients; rows without an email will be skipped');
  }
  return gaps;
}
