import { describe, expect, it } from 'vitest';
import { DEFAULT_APP_CONFIG, loadConfig } from './config';

describe('loadConfig', () => {
  it('uses the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_APP_CONFIG);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      HOST: '127.0.0.1',
      SESSION_FOLDER: '/tmp/sessions',
      MAX_CONTENT_LENGTH: '1024',
      LOG_LEVEL: 'debug',
      EMOTION_MODEL_DIR: 'weights/fer'
    });

    expect(config).toEqual({
      port: 8080,
      host: '127.0.0.1',
      sessionFolder: '/tmp/sessions',
      maxContentLength: 1024,
      logLevel: 'debug',
      classifier: { modelDir: 'weights/fer' }
    });
  });

  it('falls back when values are unusable', () => {
    const config = loadConfig({ PORT: 'abc', MAX_CONTENT_LENGTH: '-5', LOG_LEVEL: 'loud', HOST: '   ' });

    expect(config.port).toBe(5000);
    expect(config.maxContentLength).toBe(16 * 1024 * 1024);
    expect(config.logLevel).toBe('info');
    expect(config.host).toBe('0.0.0.0');
  });
});
