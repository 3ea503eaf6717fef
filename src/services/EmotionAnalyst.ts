/**
 * EmotionAnalyst - Picks the emotion classifier once at startup
 *
 * Tries to load the TensorFlow.js emotion model. When that fails the
 * synthetic classifier takes over for the lifetime of the process.
 */

import * as tf from '@tensorflow/tfjs';
import type { ClassificationResult } from '../domain/models/FrameAnalysis';
import type { ClassifierConfig } from '../config';
import { errorMessage } from '../domain/errors';
import { ModelEmotionClassifier, fromLayersModel, loadLayersModelFromDir } from './ModelEmotionClassifier';
import { SyntheticEmotionClassifier } from './SyntheticEmotionClassifier';
import { createLogger } from '../utils/logger';

const log = createLogger('EmotionAnalyst');

export type ClassifierKind = 'model' | 'synthetic';

/**
 * Scores a single decoded image
 *
 * Implementations never throw for a bad frame: they return a failed
 * result with an all-zero map instead.
 */
export interface EmotionClassifier {
  readonly kind: ClassifierKind;
  classify(image: Buffer): Promise<ClassificationResult>;
}

/**
 * Classifier chosen at startup, shared read-only by the pipeline
 */
export interface ClassifierCapability {
  readonly classifier: EmotionClassifier;
  readonly modelAvailable: boolean;
}

export function createCapability(classifier: EmotionClassifier): ClassifierCapability {
  return Object.freeze({ classifier, modelAvailable: classifier.kind === 'model' });
}

/**
 * Load the model classifier, falling back to the synthetic one
 */
export async function loadEmotionClassifier(config: ClassifierConfig): Promise<ClassifierCapability> {
  try {
    await tf.setBackend('cpu');
    await tf.ready();
    log.info(`Using backend: ${tf.getBackend()}`);

    log.info(`Loading emotion model from ${config.modelDir}...`);
    const model = fromLayersModel(await loadLayersModelFromDir(config.modelDir));
    log.info('Emotion model loaded successfully', { inputShape: model.inputShape });

    return createCapability(new ModelEmotionClassifier(model));
  } catch (error) {
    log.warn(`Emotion model not available: ${errorMessage(error)}`);
    log.warn('Using synthetic analysis for this process');
    return createCapability(new SyntheticEmotionClassifier());
  }
}
