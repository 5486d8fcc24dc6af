/**
 * Session Service
 * Keeps one IconCustomizer per client session, so layer caches survive
 * between requests, and runs the work for each session one job at a time.
 */
import { v4 as uuidv4 } from 'uuid';
import { IconSet } from '../models/icon-image';
import { IconCustomizer } from './customizer.service';
import { SvgService } from './svg.service';

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
  }
}

interface Session {
  id: string;
  customizer: IconCustomizer;
  createdAt: number;
  // Tail of this session's job queue
  queue: Promise<void>;
}

export interface SessionInfo {
  id: string;
  createdAt: number;
  imageCount: number;
}

export class SessionService {
  // Map iteration order doubles as least-recently-used order
  private readonly sessions: Map<string, Session> = new Map();

  constructor(
    private readonly maxSessions: number = 100,
    private readonly svg: SvgService = new SvgService()
  ) {}

  create(icons: IconSet): SessionInfo {
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
      console.log(`[Sessions] Evicted least recently used session ${oldest.value}`);
    }

    const session: Session = {
      id: uuidv4(),
      customizer: new IconCustomizer(icons, this.svg),
      createdAt: Date.now(),
      queue: Promise.resolve(),
    };
    this.sessions.set(session.id, session);
    console.log(`[Sessions] Created session ${session.id} with ${icons.size} base images`);

    return this.describe(session);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  info(id: string): SessionInfo {
    return this.describe(this.touch(id));
  }

  /**
   * Run `job` against the session's customizer once every job queued
   * before it has settled. A customizer is never used by two jobs at once.
   */
  run<T>(id: string, job: (customizer: IconCustomizer) => Promise<T> | T): Promise<T> {
    const session = this.touch(id);
    const result = session.queue.then(() => job(session.customizer));
    // Keep the queue moving whether or not this job fails; the caller sees the failure
    session.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  delete(id: string): boolean {
    const deleted = this.sessions.delete(id);
    if (deleted) {
      console.log(`[Sessions] Deleted session ${id}`);
    }
    return deleted;
  }

  get count(): number {
    return this.sessions.size;
  }

  private touch(id: string): Session {
    const session = this.sessions.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    this.sessions.delete(id);
    this.sessions.set(id, session);
    return session;
  }

  private describe(session: Session): SessionInfo {
    return {
      id: session.id,
      createdAt: session.createdAt,
      imageCount: session.customizer.icons.size,
    };
  }
}
