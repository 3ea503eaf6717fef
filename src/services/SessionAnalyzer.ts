/**
 * SessionAnalyzer - Runs emotion analysis over a session's frames
 *
 * Coordinates the analysis stage:
 * 1. Loads the session and its frame records
 * 2. Classifies every stored frame
 * 3. Aggregates the successful results
 * 4. Writes everything back to the session document
 */

import { createFrameAnalysis, failedClassification } from '../domain/models/FrameAnalysis';
import type { FrameAnalysis } from '../domain/models/FrameAnalysis';
import { advanceStatus } from '../domain/models/Session';
import type { SessionId } from '../domain/models/Session';
import { aggregateAnalyses } from '../domain/logic/EmotionAggregator';
import type { AggregateResult } from '../domain/logic/EmotionAggregator';
import { NoFramesError, errorMessage } from '../domain/errors';
import type { ClassifierCapability } from './EmotionAnalyst';
import type { SessionStore } from './SessionStore';
import { createLogger } from '../utils/logger';

const log = createLogger('SessionAnalyzer');

/**
 * Progress events emitted while a session is analysed
 */
export interface AnalysisProgress {
  stage: 'loading' | 'analyzing' | 'complete';
  progress: number;
  message: string;
  currentFrame?: number;
  totalFrames?: number;
}

/**
 * Per-frame results plus the session aggregate
 */
export interface AnalysisReport extends AggregateResult {
  sessionId: SessionId;
  results: FrameAnalysis[];
  modelUsed: boolean;
}

export class SessionAnalyzer {
  private readonly store: SessionStore;
  private readonly capability: ClassifierCapability;
  private readonly onProgress?: (progress: AnalysisProgress) => void;

  constructor(
    store: SessionStore,
    capability: ClassifierCapability,
    onProgress?: (progress: AnalysisProgress) => void
  ) {
    this.store = store;
    this.capability = capability;
    this.onProgress = onProgress;
  }

  /**
   * Analyse every frame of a session and persist the results
   */
  async analyzeSession(sessionId: SessionId): Promise<AnalysisReport> {
    return this.store.withSessionLock(sessionId, async () => {
      this.report({ stage: 'loading', progress: 0, message: 'Loading session...' });
      const session = await this.store.loadSession(sessionId);

      const { frames } = session;
      if (frames.length === 0) {
        throw new NoFramesError();
      }

      log.info(`Starting emotion analysis for ${frames.length} frames`, {
        sessionId,
        classifier: this.capability.classifier.kind
      });

      const results: FrameAnalysis[] = [];

      for (const [i, frame] of frames.entries()) {
        this.report({
          stage: 'analyzing',
          progress: (i / frames.length) * 100,
          message: `Analyzing frame ${i + 1}/${frames.length}`,
          currentFrame: i + 1,
          totalFrames: frames.length
        });

        try {
          const image = await this.store.readFrame(sessionId, frame.storageRef);
          const result = await this.capability.classifier.classify(image);
          results.push(createFrameAnalysis(frame, result));
          log.debug(`Analyzed frame ${frame.frameId}`);
        } catch (error) {
          log.error(`Error analyzing frame ${frame.frameId}: ${errorMessage(error)}`, { sessionId });
          results.push(createFrameAnalysis(frame, failedClassification(errorMessage(error))));
        }
      }

      const aggregate = aggregateAnalyses(results);

      await this.store.saveSession({
        ...session,
        status: advanceStatus(session.status, 'analyzed'),
        analysisResults: results,
        averageEmotions: aggregate.averageEmotions,
        dominantEmotion: aggregate.dominantEmotion,
        analyzedAt: new Date().toISOString()
      });

      this.report({
        stage: 'complete',
        progress: 100,
        message: `Complete! ${aggregate.successfulAnalyses}/${aggregate.totalFrames} frames analysed`
      });

      return {
        sessionId,
        results,
        ...aggregate,
        modelUsed: this.capability.modelAvailable
      };
    });
  }

  private report(progress: AnalysisProgress): void {
    if (this.onProgress) {
      this.onProgress(progress);
    }
  }
}
