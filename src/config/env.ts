import { z } from 'zod';
import { ErrorCodes, TravelAgentError } from '../types/errors';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().optional(),
  MODEL_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  GATE_MODEL: z.string().min(1).default('gemini-2.0-flash'),
  RESPONDER_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  PROFILE_PATH: z.string().min(1).default('data/profile.json'),
  LOG_LEVEL: LogLevelSchema.default('info'),
});

export interface AppConfig {
  apiKey?: string;
  baseURL: string;
  models: {
    gate: string;
    responder: string;
  };
  port: number;
  profilePath: string;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new TravelAgentError(
      'Invalid environment configuration',
      ErrorCodes.INVALID_CONFIG,
      parsed.error.flatten().fieldErrors,
    );
  }
  const vars = parsed.data;
  return {
    // an empty GEMINI_API_KEY= line in .env counts as unset
    apiKey: vars.GEMINI_API_KEY?.trim() || undefined,
    baseURL: vars.MODEL_BASE_URL,
    models: {
      gate: vars.GATE_MODEL,
      responder: vars.RESPONDER_MODEL,
    },
    port: vars.PORT,
    profilePath: vars.PROFILE_PATH,
    logLevel: vars.LOG_LEVEL,
  };
}

export function requireApiKey(config: AppConfig): string {
  if (!config.apiKey) {
    throw new TravelAgentError(
      'GEMINI_API_KEY is not set; the assistant cannot reach the model provider',
      ErrorCodes.MISSING_API_KEY,
    );
  }
  return config.apiKey;
}
