import * as log from '../utils/logger.js';
import { errorMessage } from '../errors.js';

// ── Public types ─────────────────────────────────────────────

export interface ManagedResource {
  readonly name: string;
  release(): Promise<void> | void;
}

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

const SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

const SIGNAL_EXIT_CODES: Record<ShutdownSignal, number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

// ── Coordinator ──────────────────────────────────────────────

/**
 * Owns every resource that must be released before the process exits
 * (open browsers, the scheduler loop). Resources register while open and
 * unregister on normal release. `shutdown` releases what is left one at a
 * time, newest first.
 */
export class ShutdownCoordinator {
  private readonly resources = new Set<ManagedResource>();
  private pending: Promise<void> | null = null;

  register(resource: ManagedResource): () => void {
    this.resources.add(resource);
    return () => {
      this.resources.delete(resource);
    };
  }

  get openCount(): number {
    return this.resources.size;
  }

  get isShuttingDown(): boolean {
    return this.pending !== null;
  }

  /** Release everything still registered. Safe to call more than once. */
  shutdown(reason: string): Promise<void> {
    if (this.pending === null) {
      this.pending = this.releaseAll(reason);
    }
    return this.pending;
  }

  /**
   * Route SIGINT/SIGTERM through `shutdown`, then hand the conventional
   * exit code to `onComplete`. Returns a disposer that unbinds the handlers.
   */
  installSignalHandlers(onComplete: (exitCode: number) => void): () => void {
    const handlers = new Map<ShutdownSignal, () => void>();

    for (const signal of SIGNALS) {
      const handler = (): void => {
        log.warn(`Received ${signal}, shutting down`);
        void this.shutdown(signal).then(() => {
          onComplete(SIGNAL_EXIT_CODES[signal]);
        });
      };
      handlers.set(signal, handler);
      process.on(signal, handler);
    }

    return () => {
      for (const [signal, handler] of handlers) {
        process.off(signal, handler);
      }
    };
  }

  private async releaseAll(reason: string): Promise<void> {
    const open = [...this.resources];
    this.resources.clear();
    if (open.length === 0) return;

    log.info(`Shutdown (${reason}): releasing ${String(open.length)} open resource(s)`);

    for (const resource of open.reverse()) {
      try {
        await resource.release();
      } catch (err) {
        log.warn(`Failed to release ${resource.name}: ${errorMessage(err)}`);
      }
    }
  }
}
