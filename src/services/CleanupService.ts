import cron, { ScheduledTask } from 'node-cron';
import { AuthChallenge, Session } from '../models';

/**
 * Periodic maintenance on `node-cron`.
 *
 * Every 10 minutes: purge expired `auth_challenges` and `sessions`.
 */
export class CleanupService {
  private tasks: ScheduledTask[] = [];
  private started = false;

  /** Register and start the jobs. Calling more than once is a no-op. */
  start(): void {
    if (this.started) {
      console.warn('[CleanupService] Already started, skipping duplicate initialisation');
      return;
    }

    this.tasks.push(
      cron.schedule('*/10 * * * *', async () => {
        await this.purgeExpired();
      })
    );

    this.started = true;
    console.log('[CleanupService] Started (challenges and sessions: every 10 min)');
  }

  /** One purge pass; failures are logged and retried on the next tick. */
  async purgeExpired(): Promise<{ challenges: number; sessions: number }> {
    let challenges = 0;
    let sessions = 0;

    try {
      challenges = await AuthChallenge.cleanupExpired();
      if (challenges > 0) {
        console.log(`[CleanupService] Purged ${challenges} expired auth challenge(s)`);
      }
    } catch (error) {
      console.error('[CleanupService] Failed to purge expired auth challenges:', error);
    }

    try {
      sessions = await Session.cleanupExpired();
      if (sessions > 0) {
        console.log(`[CleanupService] Purged ${sessions} expired session(s)`);
      }
    } catch (error) {
      console.error('[CleanupService] Failed to purge expired sessions:', error);
    }

    return { challenges, sessions };
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
    this.started = false;
    console.log('[CleanupService] All scheduled tasks stopped');
  }
}

/** Singleton instance for use across the application. */
export const cleanupService = new CleanupService();
