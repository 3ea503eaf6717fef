/**
 * ModelEmotionClassifier - TensorFlow.js facial-emotion classification
 *
 * Runs a FER-style layers model (input [1, h, w, c], one score per emotion)
 * over the whole frame. No face detector runs first, so frames without a
 * clear face still get a best-effort reading instead of an error.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import * as tf from '@tensorflow/tfjs';
import { z } from 'zod';
import { EMOTION_LABELS, createEmptyEmotionMap, roundTo } from '../domain/models/Emotion';
import type { EmotionLabel } from '../domain/models/Emotion';
import { failedClassification } from '../domain/models/FrameAnalysis';
import type { ClassificationResult } from '../domain/models/FrameAnalysis';
import { selectDominantEmotion } from '../domain/logic/EmotionAggregator';
import { ClassificationError, errorMessage } from '../domain/errors';
import { toModelPixels } from './ImageCodec';
import type { EmotionClassifier } from './EmotionAnalyst';
import { createLogger } from '../utils/logger';

const log = createLogger('ModelClassifier');

/**
 * The slice of a TensorFlow.js model the classifier needs
 */
export interface EmotionModel {
  /** [height, width, channels] of a single input image */
  inputShape: [number, number, 1 | 3];
  predict(input: tf.Tensor4D): tf.Tensor | tf.Tensor[];
}

export interface ModelClassifierOptions {
  /** Label for each model output, in output order */
  labels: readonly EmotionLabel[];
}

export const DEFAULT_MODEL_OPTIONS: ModelClassifierOptions = {
  labels: EMOTION_LABELS
};

/**
 * Wrap a loaded layers model, checking its input is a single image tensor
 */
export function fromLayersModel(model: tf.LayersModel): EmotionModel {
  const shape = model.inputs[0]?.shape;
  if (!shape || shape.length !== 4) {
    throw new ClassificationError(`Expected a 4D image input, got ${JSON.stringify(shape)}`);
  }

  const [, height, width, channels] = shape;
  if (typeof height !== 'number' || typeof width !== 'number') {
    throw new ClassificationError('Model input must have a fixed height and width');
  }
  const channelCount = channels === 1 ? 1 : channels === 3 ? 3 : undefined;
  if (channelCount === undefined) {
    throw new ClassificationError(`Unsupported input channels: ${channels}`);
  }

  return {
    inputShape: [height, width, channelCount],
    predict: input => model.predict(input)
  };
}

const WeightsManifestSchema = z.array(
  z.object({
    paths: z.array(z.string()),
    weights: z.array(
      z.object({
        name: z.string(),
        shape: z.array(z.number().int()),
        dtype: z.enum(['float32', 'int32', 'bool', 'string', 'complex64'])
      })
    )
  })
);

const ModelJsonSchema = z.object({
  modelTopology: z.record(z.string(), z.unknown()),
  weightsManifest: WeightsManifestSchema,
  format: z.string().optional(),
  generatedBy: z.string().optional(),
  convertedBy: z.string().nullable().optional()
});

/**
 * Load a layers model saved as model.json plus weight shards from a directory
 */
export async function loadLayersModelFromDir(modelDir: string): Promise<tf.LayersModel> {
  const manifestPath = path.join(modelDir, 'model.json');
  const modelJson = ModelJsonSchema.parse(JSON.parse(await readFile(manifestPath, 'utf8')));

  const shardPaths = modelJson.weightsManifest.flatMap(group => group.paths);
  const shards = await Promise.all(shardPaths.map(shard => readFile(path.join(modelDir, shard))));

  const weightData = new ArrayBuffer(shards.reduce((sum, shard) => sum + shard.byteLength, 0));
  const view = new Uint8Array(weightData);
  let offset = 0;
  for (const shard of shards) {
    view.set(shard, offset);
    offset += shard.byteLength;
  }

  return tf.loadLayersModel(
    tf.io.fromMemory({
      modelTopology: modelJson.modelTopology,
      weightSpecs: modelJson.weightsManifest.flatMap(group => group.weights),
      weightData,
      format: modelJson.format,
      generatedBy: modelJson.generatedBy,
      convertedBy: modelJson.convertedBy ?? undefined
    })
  );
}

export class ModelEmotionClassifier implements EmotionClassifier {
  readonly kind = 'model';
  private readonly model: EmotionModel;
  private readonly options: ModelClassifierOptions;

  constructor(model: EmotionModel, options: Partial<ModelClassifierOptions> = {}) {
    this.model = model;
    this.options = { ...DEFAULT_MODEL_OPTIONS, ...options };
  }

  async classify(image: Buffer): Promise<ClassificationResult> {
    try {
      const scores = await this.predictScores(image);
      const emotions = createEmptyEmotionMap();

      this.options.labels.forEach((label, i) => {
        const score = scores[i];
        if (score === undefined) return;
        if (!Number.isFinite(score)) {
          throw new ClassificationError(`Model returned a non-numeric score for ${label}`);
        }
        emotions[label] = roundTo(Math.max(0, Math.min(100, score * 100)), 2);
      });

      return {
        success: true,
        emotions,
        dominantEmotion: selectDominantEmotion(emotions)
      };
    } catch (error) {
      log.error(`Model analysis error: ${errorMessage(error)}`);
      return failedClassification(errorMessage(error));
    }
  }

  /**
   * Raw per-label probabilities for the first prediction in the batch
   */
  private async predictScores(image: Buffer): Promise<number[]> {
    const [height, width, channels] = this.model.inputShape;
    const pixels = await toModelPixels(image, width, height, channels);

    const input = tf.tensor4d(pixels, [1, height, width, channels]);
    try {
      const output = this.model.predict(input);
      const outputs = Array.isArray(output) ? output : [output];
      try {
        const first = outputs[0];
        if (!first) {
          throw new ClassificationError('Model returned no output');
        }
        const values = await first.data();
        return Array.from(values).slice(0, this.options.labels.length);
      } finally {
        outputs.forEach(tensor => tensor.dispose());
      }
    } finally {
      input.dispose();
    }
  }
}
