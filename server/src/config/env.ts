import { config } from 'dotenv';
import { z } from 'zod';
import { TableConfig } from '../modules/table/types.js';
import { TABLE_CONSTANTS } from '../modules/table/constants.js';

// Load .env file
config();

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3001),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    CLIENT_URL: z.string().default('http://localhost:5173'),
    MIN_PLAYERS: z.coerce.number().int().min(2).default(TABLE_CONSTANTS.MIN_PLAYERS),
    // 2枚 × 人数 + ボード5枚が52枚に収まる上限
    MAX_PLAYERS: z.coerce.number().int().min(2).max(TABLE_CONSTANTS.MAX_PLAYERS_LIMIT).default(TABLE_CONSTANTS.MAX_PLAYERS),
    SMALL_BLIND: z.coerce.number().int().positive().default(TABLE_CONSTANTS.SMALL_BLIND),
    BIG_BLIND: z.coerce.number().int().positive().default(TABLE_CONSTANTS.BIG_BLIND),
    STARTING_CHIPS: z.coerce.number().int().positive().default(TABLE_CONSTANTS.STARTING_CHIPS),
    START_DELAY_MS: z.coerce.number().int().nonnegative().default(TABLE_CONSTANTS.START_DELAY_MS),
  })
  .refine(e => e.MIN_PLAYERS <= e.MAX_PLAYERS, {
    message: 'MIN_PLAYERS must not exceed MAX_PLAYERS',
    path: ['MIN_PLAYERS'],
  })
  .refine(e => e.SMALL_BLIND <= e.BIG_BLIND, {
    message: 'SMALL_BLIND must not exceed BIG_BLIND',
    path: ['SMALL_BLIND'],
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>) {
  return envSchema.safeParse(source);
}

export function toTableConfig(env: Env): TableConfig {
  return {
    minPlayers: env.MIN_PLAYERS,
    maxPlayers: env.MAX_PLAYERS,
    smallBlind: env.SMALL_BLIND,
    bigBlind: env.BIG_BLIND,
    startingChips: env.STARTING_CHIPS,
    startDelayMs: env.START_DELAY_MS,
  };
}

function loadEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.success) {
    console.error('Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
