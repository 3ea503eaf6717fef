/**
 * FrameIngestService - Stores uploaded webcam frames for a session
 *
 * Each frame is decoded and written on its own. A frame that fails is
 * logged and skipped; the rest of the batch carries on.
 */

import { advanceStatus, buildFrameFilename } from '../domain/models/Session';
import type { FrameRecord, SessionId } from '../domain/models/Session';
import { ConflictError, errorMessage } from '../domain/errors';
import { decodeFrameImage } from './ImageCodec';
import type { SessionStore } from './SessionStore';
import { createLogger } from '../utils/logger';

const log = createLogger('FrameIngest');

/**
 * One client-submitted still
 */
export interface FrameInput {
  /** Base64 payload, optionally as a data URL */
  imageData: string;

  /** Client capture timestamp */
  timestamp: string;
}

export interface IngestResult {
  savedCount: number;
  savedFrames: FrameRecord[];
}

/**
 * Decode and persist a batch of frames, then record them on the session
 *
 * A session accepts one upload that saves at least one frame; later
 * uploads raise ConflictError.
 */
export async function ingestFrames(
  store: SessionStore,
  sessionId: SessionId,
  inputs: FrameInput[]
): Promise<IngestResult> {
  return store.withSessionLock(sessionId, async () => {
    const session = await store.loadSession(sessionId);
    if (session.status !== 'created') {
      throw new ConflictError('Frames have already been uploaded for this session');
    }

    const savedFrames: FrameRecord[] = [];

    for (const [i, input] of inputs.entries()) {
      const frameId = i + 1;
      try {
        const jpeg = await decodeFrameImage(input.imageData);
        const filename = buildFrameFilename(frameId, input.timestamp);
        await store.writeFrame(sessionId, filename, jpeg);

        savedFrames.push({ frameId, filename, capturedAt: input.timestamp, storageRef: filename });
        log.info(`Saved frame ${frameId}: ${filename}`);
      } catch (error) {
        log.error(`Error saving frame ${frameId}: ${errorMessage(error)}`, { sessionId });
      }
    }

    // A batch where nothing decoded leaves the session open for another upload
    const anySaved = savedFrames.length > 0;
    if (!anySaved) {
      log.warn(`No frames could be saved for session ${sessionId}`, { submitted: inputs.length });
    }

    await store.saveSession({
      ...session,
      status: anySaved ? advanceStatus(session.status, 'frames_uploaded') : session.status,
      frames: savedFrames,
      framesCount: savedFrames.length,
      uploadedAt: new Date().toISOString()
    });

    return { savedCount: savedFrames.length, savedFrames };
  });
}
