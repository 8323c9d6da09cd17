import type { Server } from 'http';
import { log } from './log';

type ShutdownCallback = () => Promise<void>;

export interface ShutdownOptions {
  timeoutMs?: number;
  /** Ends the process; replaced in tests. */
  exit?: (code: number) => void;
}

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 30_000;

/**
 * Runs registered callbacks in order on SIGTERM/SIGINT, then exits. A hard
 * timeout forces exit when a callback hangs.
 */
export class ShutdownManager {
  private readonly callbacks: Array<{ name: string; run: ShutdownCallback }> = [];
  private shuttingDown = false;
  private readonly timeoutMs: number;
  private readonly exit: (code: number) => void;

  constructor(options: ShutdownOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  public register(name: string, run: ShutdownCallback): void {
    this.callbacks.push({ name, run });
  }

  public registerServer(server: Server): void {
    this.register('http_server', () => {
      return new Promise((resolve) => {
        server.close(() => {
          log.info({ event: 'http_server_closed' }, 'http server closed');
          resolve();
        });
      });
    });
  }

  public installSignalHandlers(): void {
    process.on('SIGTERM', () => {
      void this.shutdown('SIGTERM');
    });
    process.on('SIGINT', () => {
      void this.shutdown('SIGINT');
    });
    process.on('unhandledRejection', (reason) => {
      log.error({ err: reason, event: 'unhandled_rejection' }, 'unhandled rejection');
    });
    process.on('uncaughtException', (error) => {
      log.fatal({ err: error, event: 'uncaught_exception' }, 'uncaught exception');
      void this.shutdown('uncaughtException', 1);
    });
  }

  public async shutdown(signal: string, exitCode = 0): Promise<void> {
    if (this.shuttingDown) {
      log.warn({ event: 'shutdown_in_progress', signal }, 'shutdown already in progress');
      return;
    }
    this.shuttingDown = true;
    log.info({ event: 'shutdown_started', signal }, 'graceful shutdown started');

    const hardStop = setTimeout(() => {
      log.error({ event: 'shutdown_timeout', timeout_ms: this.timeoutMs }, 'shutdown timeout exceeded, forcing exit');
      this.exit(1);
    }, this.timeoutMs);
    hardStop.unref();

    for (const callback of this.callbacks) {
      try {
        await callback.run();
      } catch (error) {
        log.error({ err: error, event: 'shutdown_callback_failed', callback: callback.name }, 'shutdown callback failed');
      }
    }

    clearTimeout(hardStop);
    log.info({ event: 'shutdown_completed', signal }, 'graceful shutdown completed');
    this.exit(exitCode);
  }
}
