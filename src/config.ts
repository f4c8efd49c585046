import path from 'path';
import { z } from 'zod';

const configSchema = z.object({
  // Environment
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // Server
  port: z.coerce.number().default(3000),
  apiSecretKey: z.string().min(16),
  corsOrigins: z.string().transform((s) => s.split(',')).default('*'),

  // Database
  databaseUrl: z.string().url(),

  // Redis / sessions
  redisUrl: z.string().default('redis://localhost:6379'),
  sessionStore: z.enum(['redis', 'memory']).default('redis'),
  sessionTtlSeconds: z.coerce.number().int().positive().default(86400),

  // Extraction
  anthropicApiKey: z.string(),
  extractionModel: z.string().default('claude-haiku-4-5-20251001'),
  extractor: z.enum(['llm', 'rules']).default('llm'),
  extractionTimeoutMs: z.coerce.number().int().positive().default(8000),
  extractionRpmLimit: z.coerce.number().int().positive().default(50),

  // Catalog
  catalogPath: z.string().default(path.join(__dirname, '..', 'data', 'symptom-catalog.json')),

  // Intake policy
  minFollowUps: z.coerce.number().int().min(0).default(2),
  demographicRetryCap: z.coerce.number().int().min(1).default(2),
  symptomClarifications: z.coerce.number().int().min(0).default(1),
  categoryCapRedFlag: z.coerce.number().int().min(0).default(2),
  categoryCapDetail: z.coerce.number().int().min(0).default(3),
  categoryCapVitalSign: z.coerce.number().int().min(0).default(2),
  idleTimeoutMs: z.coerce.number().int().positive().default(15 * 60 * 1000),

  // Doctor notifications
  telegramBotToken: z.string().optional(),
  doctorChatId: z.string().optional(),

  // Worker
  workerConcurrency: z.coerce.number().default(20),
  jobTimeoutMs: z.coerce.number().default(60000),

  // Logging
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

function loadConfig() {
  const result = configSchema.safeParse({
    nodeEnv: process.env.NODE_ENV,
    port: process.env.PORT,
    apiSecretKey: process.env.API_SECRET_KEY,
    corsOrigins: process.env.CORS_ORIGINS,
    databaseUrl: process.env.DATABASE_URL,
    redisUrl: process.env.REDIS_URL,
    sessionStore: process.env.SESSION_STORE,
    sessionTtlSeconds: process.env.SESSION_TTL_SECONDS,
    anthropicApiKey: process.env.ANTHROPIC_API_KEY,
    extractionModel: process.env.EXTRACTION_MODEL,
    extractor: process.env.EXTRACTOR,
    extractionTimeoutMs: process.env.EXTRACTION_TIMEOUT_MS,
    extractionRpmLimit: process.env.EXTRACTION_RPM_LIMIT,
    catalogPath: process.env.CATALOG_PATH || undefined,
    minFollowUps: process.env.MIN_FOLLOW_UPS,
    demographicRetryCap: process.env.DEMOGRAPHIC_RETRY_CAP,
    symptomClarifications: process.env.SYMPTOM_CLARIFICATIONS,
    categoryCapRedFlag: process.env.CATEGORY_CAP_RED_FLAG,
    categoryCapDetail: process.env.CATEGORY_CAP_DETAIL,
    categoryCapVitalSign: process.env.CATEGORY_CAP_VITAL_SIGN,
    idleTimeoutMs: process.env.IDLE_TIMEOUT_MS,
    telegramBotToken: process.env.TELEGRAM_BOT_TOKEN || undefined,
    doctorChatId: process.env.DOCTOR_CHAT_ID || undefined,
    workerConcurrency: process.env.WORKER_CONCURRENCY,
    jobTimeoutMs: process.env.JOB_TIMEOUT_MS,
    logLevel: process.env.LOG_LEVEL,
  });

  if (!result.success) {
    console.error('Configuration validation failed:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();
export type Config = z.infer<typeof configSchema>;
