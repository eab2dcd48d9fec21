import { setTimeout as sleep } from 'node:timers/promises';
import { MAX_RETRIES, RETRY_DELAY_MS } from '../constants';
import type { SessionConfig } from '../types';
import type { CredentialRotator } from './credentialRotator';
import { describeError } from './errors';
import type { LiveConnection, LiveConnector } from './liveConnection';
import { createLogger } from './logger';

const logger = createLogger('connect');

export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  signal?: AbortSignal;
}

/**
 * Opens a live connection, drawing a fresh credential and reading the config
 * again on every attempt. Throws the last attempt's error once the attempts
 * are used up.
 */
export async function connectWithRetry(
  connector: LiveConnector,
  rotator: CredentialRotator,
  readConfig: () => Readonly<SessionConfig>,
  { maxAttempts = MAX_RETRIES, delayMs = RETRY_DELAY_MS, signal }: RetryOptions = {}
): Promise<LiveConnection> {
  let lastError: unknown = new Error('No connection attempt was made');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal?.throwIfAborted();
    try {
      const connection = await connector.open(rotator.next(), readConfig());
      logger.info('Live connection established');
      return connection;
    } catch (error) {
      lastError = error;
      logger.warn(`Failed to connect (attempt ${attempt}/${maxAttempts}): ${describeError(error)}`);
      if (attempt < maxAttempts) {
        await sleep(delayMs, undefined, { signal });
      }
    }
  }

  logger.error(`Failed to connect after ${maxAttempts} attempts`);
  throw lastError;
}
