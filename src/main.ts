/**
 * Emotion session backend
 *
 * Main entry point: loads configuration, picks the classifier and starts
 * the HTTP server.
 */

import { createApp, listen } from './api/app';
import { loadConfig } from './config';
import { errorMessage } from './domain/errors';
import { loadEmotionClassifier } from './services/EmotionAnalyst';
import { SessionStore } from './services/SessionStore';
import { createLogger, setLogLevel } from './utils/logger';

const log = createLogger('Main');

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  log.info('Emotion session backend initializing...');

  const store = new SessionStore(config.sessionFolder);
  await store.init();

  const capability = await loadEmotionClassifier(config.classifier);
  log.info(
    capability.modelAvailable
      ? 'Classifier: emotion model'
      : 'Classifier: synthetic (emotion model not available)'
  );

  const app = createApp({ config, store, capability });
  await listen(app, config.port, config.host);
  log.info(`Listening on http://${config.host}:${config.port}`, { sessionFolder: store.rootDir });
}

main().catch(error => {
  log.error(`Startup failed: ${errorMessage(error)}`);
  process.exit(1);
});
