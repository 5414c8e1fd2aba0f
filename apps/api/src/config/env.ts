import 'dotenv/config';

import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  WEB_ORIGIN: z.string().url().default('http://localhost:5173'),
  JSON_BODY_LIMIT: z.string().min(1).default('1mb'),
  MAX_PARTICIPANTS: z.coerce.number().int().positive().max(10000).default(500),
});

export const env = envSchema.parse(process.env);

export const isProduction = env.NODE_ENV === 'production';
