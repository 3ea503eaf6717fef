/**
 * JSON API routes
 *
 *   GET    /api/health
 *   POST   /api/create-session
 *   POST   /api/upload-frames
 *   POST   /api/analyze-emotions
 *   POST   /api/get-recommendations
 *   GET    /api/sessions/:sessionId
 *   DELETE /api/sessions/:sessionId
 */

import { Router } from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { buildRecommendationReport } from '../domain/logic/RecommendationEngine';
import type { ClassifierCapability } from '../services/EmotionAnalyst';
import { ingestFrames } from '../services/FrameIngestService';
import type { SessionAnalyzer } from '../services/SessionAnalyzer';
import type { SessionStore } from '../services/SessionStore';
import { AnalyzeEmotionsSchema, RecommendationsSchema, UploadFramesSchema, parseBody } from './schemas';

export interface ApiDependencies {
  store: SessionStore;
  capability: ClassifierCapability;
  analyzer: SessionAnalyzer;
}

/**
 * Forward rejected promises to the Express error handler
 */
function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createApiRouter({ store, capability, analyzer }: ApiDependencies): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      message: 'Emotion Detection API is running',
      modelAvailable: capability.modelAvailable,
      classifier: capability.classifier.kind,
      timestamp: new Date().toISOString()
    });
  });

  router.post(
    '/create-session',
    asyncRoute(async (_req, res) => {
      const session = await store.createSession(capability.modelAvailable);
      res.json({ success: true, sessionId: session.id, message: 'Session created successfully' });
    })
  );

  router.post(
    '/upload-frames',
    asyncRoute(async (req, res) => {
      const { sessionId, frames } = parseBody(UploadFramesSchema, req.body);
      const { savedCount } = await ingestFrames(store, sessionId, frames);
      res.json({
        success: true,
        message: `Successfully saved ${savedCount} frames`,
        framesSaved: savedCount
      });
    })
  );

  router.post(
    '/analyze-emotions',
    asyncRoute(async (req, res) => {
      const { sessionId } = parseBody(AnalyzeEmotionsSchema, req.body);
      const report = await analyzer.analyzeSession(sessionId);
      res.json({ success: true, ...report });
    })
  );

  router.post('/get-recommendations', (req, res) => {
    const { dominantEmotion, emotions } = parseBody(RecommendationsSchema, req.body);
    res.json({ success: true, ...buildRecommendationReport(emotions, dominantEmotion) });
  });

  router.get(
    '/sessions/:sessionId',
    asyncRoute(async (req, res) => {
      const session = await store.loadSession(req.params.sessionId);
      res.json({ success: true, session });
    })
  );

  router.delete(
    '/sessions/:sessionId',
    asyncRoute(async (req, res) => {
      await store.deleteSession(req.params.sessionId);
      res.json({ success: true, message: 'Session deleted' });
    })
  );

  return router;
}
