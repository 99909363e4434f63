import { z } from 'zod';

// z.coerce.boolean() treats any non-empty string as true
const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DISCORD_TOKEN: z.string().min(1),
  DISCORD_APPLICATION_ID: z.string().min(1),
  COMMAND_PREFIX: z.string().min(1).max(3).default('!'),
  LAVALINK_HOST: z.string().default('localhost'),
  LAVALINK_PORT: z.coerce.number().int().positive().default(2333),
  LAVALINK_PASSWORD: z.string().min(1),
  LAVALINK_SECURE: flag,
  // Station presets
  PRESET_STORE: z.enum(['file', 'redis']).default('file'),
  PRESETS_FILE: z.string().default('stations.json'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  // Session tuning
  AUTOPLAY_DURATION_MINUTES: z.coerce.number().int().positive().default(120),
  RADIO_DURATION_MINUTES: z.coerce.number().int().positive().default(120),
  RADIO_MAX_ENERGY: z.coerce.number().int().min(1).max(10).default(2),
  PLAYBACK_RETRY_CAP: z.coerce.number().int().min(1).max(10).default(3),
  // Health and metrics
  HEALTH_HTTP_PORT: z.coerce.number().int().positive().default(3001),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

export const env: Env = parseEnv();
