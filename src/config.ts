/**
 * Application configuration
 *
 * Defaults below, overridden from environment variables at startup.
 */

import { isLogLevel } from './utils/logger';
import type { LogLevel } from './utils/logger';

export interface ClassifierConfig {
  /** Directory holding a TensorFlow.js layers model (model.json + weights) */
  modelDir: string;
}

export interface AppConfig {
  port: number;
  host: string;

  /** Root directory; every session gets a sub-directory named after its id */
  sessionFolder: string;

  /** Maximum JSON request body in bytes */
  maxContentLength: number;

  logLevel: LogLevel;
  classifier: ClassifierConfig;
}

export const DEFAULT_APP_CONFIG: AppConfig = {
  port: 5000,
  host: '0.0.0.0',
  sessionFolder: 'sessions',
  maxContentLength: 16 * 1024 * 1024,
  logLevel: 'info',
  classifier: {
    modelDir: 'models/emotion'
  }
};

function readPositiveInt(raw: string | undefined, fallback: number): number {
  const value = Number(raw ?? '');
  if (!raw || !Number.isFinite(value) || value <= 0) return fallback;
  return Math.floor(value);
}

function readString(raw: string | undefined, fallback: string): string {
  const value = raw?.trim();
  return value ? value : fallback;
}

/**
 * Build the configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readPositiveInt(env.PORT, DEFAULT_APP_CONFIG.port),
    host: readString(env.HOST, DEFAULT_APP_CONFIG.host),
    sessionFolder: readString(env.SESSION_FOLDER, DEFAULT_APP_CONFIG.sessionFolder),
    maxContentLength: readPositiveInt(env.MAX_CONTENT_LENGTH, DEFAULT_APP_CONFIG.maxContentLength),
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : DEFAULT_APP_CONFIG.logLevel,
    classifier: {
      modelDir: readString(env.EMOTION_MODEL_DIR, DEFAULT_APP_CONFIG.classifier.modelDir)
    }
  };
}
