import 'dotenv/config';
import React from 'react';
import { render } from 'ink';
import App from './App';
import { DEFAULT_CONFIG } from './constants';
import { SoxAudioDevice } from './services/audioDevice';
import { CredentialRotator } from './services/credentialRotator';
import { loadEnvironment } from './services/environment';
import { ConfigurationError } from './services/errors';
import { GeminiLiveConnector } from './services/liveConnection';
import { createLogger, setLogLevel } from './services/logger';
import { SessionOrchestrator } from './services/sessionOrchestrator';

const logger = createLogger('main');

async function main(): Promise<void> {
  const env = loadEnvironment(process.env);
  setLogLevel(env.logLevel);

  const orchestrator = new SessionOrchestrator({
    connector: new GeminiLiveConnector(env.model),
    rotator: new CredentialRotator(env.credentials),
    audio: new SoxAudioDevice({ captureDevice: env.captureDevice }),
    config: DEFAULT_CONFIG
  });

  const app = render(<App orchestrator={orchestrator} interactive={Boolean(process.stdin.isTTY)} />);
  await app.waitUntilExit();
  await orchestrator.stop();
}

main().catch(error => {
  if (error instanceof ConfigurationError) {
    logger.error(error.message);
  } else {
    logger.error('Unexpected error', error);
  }
  process.exitCode = 1;
});
