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

  // Redis
  redisUrl: z.string().default('redis://localhost:6379'),

  // WhatsApp Cloud API
  whatsappApiUrl: z.string().url().default('https://graph.facebook.com/v18.0'),
  whatsappPhoneNumberId: z.string().min(1),
  whatsappAccessToken: z.string().min(1),
  whatsappVerifyToken: z.string().min(1),

  // Conversation
  defaultLanguage: z.enum(['ar', 'en']).default('ar'),
  sessionIdleTimeoutMinutes: z.coerce.number().int().positive().default(30),
  photoCaptionPolicy: z.enum(['ignore', 'append']).default('ignore'),
  routingRulesPath: z.string().optional(),

  // Worker
  inboundShards: z.coerce.number().int().min(1).max(64).default(4),
  jobTimeoutMs: z.coerce.number().default(60000),

  // Review workflow
  reviewSlaHours: z.coerce.number().positive().default(48),
  reminderCron: z.string().default('0 9 * * *'),

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
    whatsappApiUrl: process.env.WHATSAPP_API_URL,
    whatsappPhoneNumberId: process.env.WHATSAPP_PHONE_NUMBER_ID,
    whatsappAccessToken: process.env.WHATSAPP_ACCESS_TOKEN,
    whatsappVerifyToken: process.env.WHATSAPP_VERIFY_TOKEN,
    defaultLanguage: process.env.DEFAULT_LANGUAGE,
    sessionIdleTimeoutMinutes: process.env.SESSION_IDLE_TIMEOUT_MINUTES,
    photoCaptionPolicy: process.env.PHOTO_CAPTION_POLICY,
    routingRulesPath: process.env.ROUTING_RULES_PATH,
    inboundShards: process.env.INBOUND_SHARDS,
    jobTimeoutMs: process.env.JOB_TIMEOUT_MS,
    reviewSlaHours: process.env.REVIEW_SLA_HOURS,
    reminderCron: process.env.REMINDER_CRON,
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
