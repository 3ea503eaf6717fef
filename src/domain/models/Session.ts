/**
 * Session - The aggregate root of a capture-and-analyze workflow
 *
 * Persisted as one JSON document per session. Each pipeline stage reads it,
 * adds its own fields and writes it back.
 */

import type { EmotionLabel, EmotionScoreMap } from './Emotion';
import type { FrameAnalysis } from './FrameAnalysis';

export type SessionId = string;

/**
 * Lifecycle stages, in the only order a session may move through them
 */
export const SESSION_STATUSES = ['created', 'frames_uploaded', 'analyzed'] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

/**
 * FrameRecord - One ingested frame
 */
export interface FrameRecord {
  /** 1-based position of the frame in the uploaded batch */
  frameId: number;

  /** Stored file name, unique within the session */
  filename: string;

  /** Client-supplied capture timestamp, echoed back verbatim */
  capturedAt: string;

  /** File inside the session directory that holds the image */
  storageRef: string;
}

export interface Session {
  id: SessionId;
  createdAt: string;
  status: SessionStatus;

  /** Whether the model classifier was active when the session was created */
  modelAvailable: boolean;

  framesCount: number;
  frames: FrameRecord[];
  uploadedAt?: string;

  analysisResults?: FrameAnalysis[];
  averageEmotions?: EmotionScoreMap;
  dominantEmotion?: EmotionLabel;
  analyzedAt?: string;
}

/**
 * Create the initial document for a freshly generated session id
 */
export function createSession(id: SessionId, modelAvailable: boolean, now: Date = new Date()): Session {
  return {
    id,
    createdAt: now.toISOString(),
    status: 'created',
    modelAvailable,
    framesCount: 0,
    frames: []
  };
}

/**
 * Move a session forward. Status never regresses: asking for an earlier
 * stage keeps the current one.
 */
export function advanceStatus(current: SessionStatus, next: SessionStatus): SessionStatus {
  return SESSION_STATUSES.indexOf(next) > SESSION_STATUSES.indexOf(current) ? next : current;
}

/**
 * Build the stored file name for a frame: frame_{NN}_{timestamp}.jpg
 * with ':' and '.' in the timestamp replaced by '-'
 */
export function buildFrameFilename(frameId: number, capturedAt: string): string {
  const index = String(frameId).padStart(2, '0');
  const sanitized = capturedAt.replace(/[:.]/g, '-');
  return `frame_${index}_${sanitized}.jpg`;
}
