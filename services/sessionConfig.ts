import { z } from 'zod';
import { DEFAULT_CONFIG, VOICE_OPTIONS } from '../constants';
import { ResponseModality, type SessionConfig, type SessionConfigUpdate } from '../types';
import { ConfigurationError } from './errors';

export const sessionConfigSchema = z.object({
  voiceName: z.enum(VOICE_OPTIONS),
  systemInstruction: z.string().trim().min(1),
  responseModality: z.nativeEnum(ResponseModality)
});

export const sessionConfigUpdateSchema = sessionConfigSchema.partial().strict();

export function parseConfigUpdate(input: unknown): SessionConfigUpdate {
  const parsed = sessionConfigUpdateSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid session config: ${details}`);
  }
  return parsed.data;
}

export function mergeConfig(base: SessionConfig, update: SessionConfigUpdate): SessionConfig {
  return {
    voiceName: update.voiceName ?? base.voiceName,
    systemInstruction: update.systemInstruction ?? base.systemInstruction,
    responseModality: update.responseModality ?? base.responseModality
  };
}

/**
 * Holds the current SessionConfig. Snapshots are frozen and replaced
 * wholesale on every update, so a reader never sees a half-applied change.
 */
export class SessionConfigStore {
  private current: Readonly<SessionConfig>;

  constructor(initial: SessionConfig = DEFAULT_CONFIG) {
    this.current = Object.freeze({ ...initial });
  }

  snapshot(): Readonly<SessionConfig> {
    return this.current;
  }

  apply(update: SessionConfigUpdate): Readonly<SessionConfig> {
    this.current = Object.freeze(mergeConfig(this.current, update));
    return this.current;
  }
}
