import { SessionService } from './SessionService.js';
import { logger } from '../utils/logger.js';

/**
 * Periodically sweeps expired sessions out of the store, so that idle
 * records do not wait for the next session creation to be removed.
 */
export class ReaperService {
  private interval: NodeJS.Timeout | undefined;
  private readonly log = logger.child({ component: 'session-reaper' });

  constructor(
    private sessions: SessionService,
    private intervalMs: number
  ) {}

  /**
   * Start the reaper; restarting replaces the running timer
   */
  start(): void {
    this.stop();

    this.interval = setInterval(() => {
      this.reap();
    }, this.intervalMs);
    // The sweep alone must not keep the process alive
    this.interval.unref();

    this.log.info('Session reaper started', { intervalMs: this.intervalMs });
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = undefined;
      this.log.info('Session reaper stopped');
    }
  }

  isRunning(): boolean {
    return this.interval !== undefined;
  }

  /**
   * Run one sweep now
   */
  reap(): number {
    try {
      return this.sessions.sweep();
    } catch (error) {
      this.log.error('Session sweep failed', {}, error instanceof Error ? error : new Error(String(error)));
      return 0;
    }
  }
}
