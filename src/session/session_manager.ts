/**
 * @fileoverview Process-lifetime map of user sessions
 *
 * Sessions are created lazily and never evicted. Work on one session runs
 * under that session's lock; different users proceed in parallel.
 */

import { KeyedMutex } from '../utils/keyed_mutex.js';
import { createLogger } from '../telemetry/logger.js';
import { Session } from './session.js';

const log = createLogger('session-manager');

export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new KeyedMutex();

  /**
   * Get the session for `userId`, creating it on first use.
   */
  get(userId: string): Session {
    const existing = this.sessions.get(userId);
    if (existing) return existing;
    log.info('Creating session', { userId });
    const session = new Session(userId);
    this.sessions.set(userId, session);
    return session;
  }

  has(userId: string): boolean {
    return this.sessions.has(userId);
  }

  /**
   * Run `task` with exclusive access to the user's session. The lock is
   * released when `task` settles.
   */
  withSession<T>(userId: string, task: (session: Session) => Promise<T> | T): Promise<T> {
    return this.locks.runExclusive(userId, () => task(this.get(userId)));
  }

  /**
   * Reset a session's state under its lock. Unknown users are a no-op.
   */
  async clear(userId: string): Promise<void> {
    if (!this.sessions.has(userId)) return;
    await this.withSession(userId, (session) => session.clear());
  }

  size(): number {
    return this.sessions.size;
  }
}
