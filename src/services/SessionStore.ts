/**
 * SessionStore - Filesystem-backed session persistence
 *
 * Layout:
 *   <root>/<sessionId>/session.json   the session document
 *   <root>/<sessionId>/frame_*.jpg    frames owned by the session
 *
 * Documents are written to a temp file and renamed into place so a reader
 * never sees a partial write.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { EMOTION_LABELS } from '../domain/models/Emotion';
import type { EmotionScoreMap } from '../domain/models/Emotion';
import type { FrameAnalysis } from '../domain/models/FrameAnalysis';
import { SESSION_STATUSES, createSession } from '../domain/models/Session';
import type { Session, SessionId } from '../domain/models/Session';
import { NotFoundError, StorageError, errorMessage } from '../domain/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('SessionStore');

const DOCUMENT_NAME = 'session.json';
const SESSION_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const Label = z.enum(EMOTION_LABELS);

const ScoreMapSchema: z.ZodType<EmotionScoreMap> = z.object({
  angry: z.number(),
  disgust: z.number(),
  fear: z.number(),
  happy: z.number(),
  sad: z.number(),
  surprise: z.number(),
  neutral: z.number()
});

const FrameAnalysisSchema: z.ZodType<FrameAnalysis> = z.object({
  frameId: z.number().int(),
  capturedAt: z.string(),
  filename: z.string(),
  emotions: ScoreMapSchema,
  dominantEmotion: Label,
  success: z.boolean(),
  error: z.string().optional()
});

const SessionDocumentSchema: z.ZodType<Session> = z.object({
  id: z.string(),
  createdAt: z.string(),
  status: z.enum(SESSION_STATUSES),
  modelAvailable: z.boolean(),
  framesCount: z.number().int(),
  frames: z.array(
    z.object({
      frameId: z.number().int(),
      filename: z.string(),
      capturedAt: z.string(),
      storageRef: z.string()
    })
  ),
  uploadedAt: z.string().optional(),
  analysisResults: z.array(FrameAnalysisSchema).optional(),
  averageEmotions: ScoreMapSchema.optional(),
  dominantEmotion: Label.optional(),
  analyzedAt: z.string().optional()
});

export function isValidSessionId(id: string): boolean {
  return SESSION_ID_PATTERN.test(id);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class SessionStore {
  private readonly root: string;
  private readonly locks = new Map<SessionId, Promise<void>>();

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * Make sure the root directory exists
   */
  async init(): Promise<void> {
    try {
      await mkdir(this.root, { recursive: true });
    } catch (error) {
      throw new StorageError(`Cannot create session folder ${this.root}: ${errorMessage(error)}`, { cause: error });
    }
  }

  get rootDir(): string {
    return this.root;
  }

  sessionDir(id: SessionId): string {
    if (!isValidSessionId(id)) {
      throw new NotFoundError();
    }
    return path.join(this.root, id);
  }

  async createSession(modelAvailable: boolean): Promise<Session> {
    const session = createSession(randomUUID(), modelAvailable);

    try {
      await mkdir(this.sessionDir(session.id), { recursive: true });
    } catch (error) {
      throw new StorageError(`Cannot create session storage: ${errorMessage(error)}`, { cause: error });
    }
    await this.saveSession(session);

    log.info(`Created session: ${session.id}`);
    return session;
  }

  async loadSession(id: SessionId): Promise<Session> {
    const file = path.join(this.sessionDir(id), DOCUMENT_NAME);

    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) throw new NotFoundError();
      throw new StorageError(`Cannot read session ${id}: ${errorMessage(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(`Session ${id} document is not valid JSON`, { cause: error });
    }

    const result = SessionDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError(`Session ${id} document is malformed: ${result.error.message}`);
    }
    return result.data;
  }

  async saveSession(session: Session): Promise<void> {
    const dir = this.sessionDir(session.id);
    const target = path.join(dir, DOCUMENT_NAME);
    const temp = path.join(dir, `.${DOCUMENT_NAME}.${randomUUID()}.tmp`);

    try {
      await writeFile(temp, JSON.stringify(session, null, 2), 'utf8');
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw new StorageError(`Cannot save session ${session.id}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async sessionExists(id: SessionId): Promise<boolean> {
    if (!isValidSessionId(id)) return false;
    try {
      await stat(path.join(this.root, id, DOCUMENT_NAME));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw new StorageError(`Cannot stat session ${id}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Delete a session directory with every frame it owns
   *
   * Waits for any upload or analysis holding the session's lock.
   */
  async deleteSession(id: SessionId): Promise<void> {
    return this.withSessionLock(id, async () => {
      if (!(await this.sessionExists(id))) {
        throw new NotFoundError();
      }
      try {
        await rm(this.sessionDir(id), { recursive: true, force: true });
      } catch (error) {
        throw new StorageError(`Cannot delete session ${id}: ${errorMessage(error)}`, { cause: error });
      }
      log.info(`Deleted session: ${id}`);
    });
  }

  async writeFrame(id: SessionId, storageRef: string, bytes: Buffer): Promise<void> {
    await writeFile(this.framePath(id, storageRef), bytes);
  }

  async readFrame(id: SessionId, storageRef: string): Promise<Buffer> {
    return readFile(this.framePath(id, storageRef));
  }

  /**
   * Run fn while holding the session's lock
   *
   * Calls for the same id run one after another; different ids never wait
   * on each other.
   */
  async withSessionLock<T>(id: SessionId, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(id) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(id, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.locks.get(id) === tail) {
        this.locks.delete(id);
      }
    }
  }

  private framePath(id: SessionId, storageRef: string): string {
    // stored refs are plain file names inside the session directory
    if (path.basename(storageRef) !== storageRef) {
      throw new StorageError(`Invalid frame reference: ${storageRef}`);
    }
    return path.join(this.sessionDir(id), storageRef);
  }
}
