import * as dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  DATABASE_URL: z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined)),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  NODE_ENV: z.string().default('development'),
});

export interface AppConfig {
  databaseUrl: string | undefined;
  port: number;
  nodeEnv: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { DATABASE_URL, PORT, NODE_ENV } = envSchema.parse(env);
  return {
    databaseUrl: DATABASE_URL,
    port: PORT,
    nodeEnv: NODE_ENV,
  };
}

// Reads .env into process.env; variables already set win
export function loadEnvFile(): void {
  dotenv.config();
}
