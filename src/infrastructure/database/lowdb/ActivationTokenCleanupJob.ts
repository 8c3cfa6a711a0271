// Infrastructure: Activation Token Cleanup Job
// Periodic background removal of activation codes that expired long ago

import type { IActivationTokenRepository } from '@/domain/user/repository.js';
import { cleanupLogger, errorMessage } from '@/utils/logger.js';

export interface TokenCleanupConfig {
  intervalMs: number;      // Cleanup interval (default: 1 hour)
  retentionMs: number;     // How long an expired code is kept (default: 7 days)
  enabled: boolean;
  logEnabled: boolean;
}

/**
 * ActivationTokenCleanupJob - Periodic cleanup of stale activation codes
 *
 * Expired codes are kept for a retention window so that a late activation
 * attempt still finds its code and gets a fresh one mailed.
 */
export class ActivationTokenCleanupJob {
  private intervalId: NodeJS.Timeout | null = null;

  constructor(
    private tokenRepo: IActivationTokenRepository,
    private config: TokenCleanupConfig
  ) {}

  /**
   * Start the periodic cleanup job
   */
  start(): void {
    if (!this.config.enabled) {
      if (this.config.logEnabled) {
        cleanupLogger.info('Cleanup disabled, not starting');
      }
      return;
    }

    if (this.intervalId) {
      if (this.config.logEnabled) {
        cleanupLogger.warn('Already running');
      }
      return;
    }

    this.intervalId = setInterval(() => {
      this.runOnce().catch((error) => {
        cleanupLogger.error('Periodic cleanup failed', { error: errorMessage(error) });
      });
    }, this.config.intervalMs);
    this.intervalId.unref();

    if (this.config.logEnabled) {
      cleanupLogger.info('Started', {
        intervalMs: this.config.intervalMs,
        retentionMs: this.config.retentionMs,
      });
    }
  }

  /**
   * Stop the periodic cleanup job
   */
  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;

      if (this.config.logEnabled) {
        cleanupLogger.info('Stopped');
      }
    }
  }

  /**
   * Remove unvalidated codes whose expiry is older than the retention window
   */
  async runOnce(now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.config.retentionMs);
    const deleted = await this.tokenRepo.deleteExpiredBefore(cutoff);

    if (deleted > 0) {
      cleanupLogger.info('Removed stale activation tokens', {
        count: deleted,
        cutoff: cutoff.toISOString(),
      });
    } else if (this.config.logEnabled) {
      cleanupLogger.debug('No stale activation tokens to remove');
    }

    return deleted;
  }

  getStatus(): { running: boolean; intervalMs: number; enabled: boolean } {
    return {
      running: this.intervalId !== null,
      intervalMs: this.config.intervalMs,
      enabled: this.config.enabled,
    };
  }
}

/**
 * Default configuration for token cleanup
 */
export function defaultCleanupConfig(): TokenCleanupConfig {
  return {
    intervalMs: 60 * 60 * 1000,           // 1 hour
    retentionMs: 7 * 24 * 60 * 60 * 1000, // 7 days
    enabled: true,
    logEnabled: true,
  };
}
