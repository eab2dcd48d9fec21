import { z } from 'zod';
import { MODEL_NAME } from '../constants';
import { ConfigurationError } from './errors';
import { LOG_LEVELS, type LogLevel } from './logger';

const environmentSchema = z.object({
  GEMINI_API_KEYS: z.string().optional(),
  GEMINI_MODEL: z.string().trim().min(1).default(MODEL_NAME),
  AUDIO_CAPTURE_DEVICE: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

export interface Environment {
  credentials: string[];
  model: string;
  captureDevice?: string;
  logLevel: LogLevel;
}

export function parseCredentials(value: string | undefined): string[] {
  if (!value) {
    throw new ConfigurationError('GEMINI_API_KEYS environment variable not set');
  }
  const credentials = value
    .split(',')
    .map(key => key.trim())
    .filter(key => key.length > 0);
  if (credentials.length === 0) {
    throw new ConfigurationError('No valid Gemini API keys found in GEMINI_API_KEYS');
  }
  return credentials;
}

export function loadEnvironment(env: NodeJS.ProcessEnv): Environment {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  return {
    credentials: parseCredentials(parsed.data.GEMINI_API_KEYS),
    model: parsed.data.GEMINI_MODEL,
    captureDevice: parsed.data.AUDIO_CAPTURE_DEVICE,
    logLevel: parsed.data.LOG_LEVEL
  };
}
