/**
 * Graceful shutdown: cleanup handlers run one after another in
 * registration order, under a hard timeout
 */

import { logger, errorMessage } from './logger';

type CleanupHandler = () => Promise<void> | void;

export interface ShutdownOptions {
  timeoutMs?: number;
  exit?: (code: number) => void;
}

export class ShutdownManager {
  private handlers: { name: string; handler: CleanupHandler }[] = [];
  private forcedExitHandlers: { name: string; handler: () => void }[] = [];
  private isShuttingDown = false;
  private initialized = false;
  private readonly shutdownTimeout: number;
  private readonly exit: (code: number) => void;

  constructor(options: ShutdownOptions = {}) {
    this.shutdownTimeout = options.timeoutMs ?? 30000;
    this.exit = options.exit || ((code: number) => process.exit(code));
  }

  /**
   * Register a cleanup handler to be called during shutdown
   */
  registerHandler(name: string, handler: CleanupHandler): void {
    this.handlers.push({ name, handler });
  }

  /**
   * Register a synchronous step that runs only when the hard timeout fires,
   * right before the forced exit
   */
  registerForcedExitHandler(name: string, handler: () => void): void {
    this.forcedExitHandlers.push({ name, handler });
  }

  private runForcedExitHandlers(): void {
    for (const { name, handler } of this.forcedExitHandlers) {
      try {
        handler();
        logger.info(`Forced-exit step (${name}) completed`);
      } catch (error) {
        logger.error(`Forced-exit step (${name}) failed: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * Initialize shutdown listeners
   */
  initialize(): void {
    if (this.initialized) return;
    this.initialized = true;
    for (const signal of ['SIGTERM', 'SIGINT', 'SIGHUP'] as const) {
      process.on(signal, () => {
        this.shutdown(signal).catch(err => logger.error(`Shutdown error: ${errorMessage(err)}`));
      });
    }
  }

  /**
   * Execute shutdown sequence. A failing handler is logged and the rest
   * still run. Exit code is 0 unless the caller asks otherwise.
   */
  async shutdown(reason: string, exitCode = 0): Promise<void> {
    if (this.isShuttingDown) {
      logger.warn(`Already shutting down, ignoring ${reason}`);
      return;
    }

    this.isShuttingDown = true;
    logger.info(`Received ${reason}, starting graceful shutdown...`);

    // Set a hard timeout for shutdown
    const timeout = setTimeout(() => {
      logger.error('Shutdown timeout exceeded, forcing exit');
      this.runForcedExitHandlers();
      this.exit(1);
    }, this.shutdownTimeout);

    let failures = 0;
    for (const [index, { name, handler }] of this.handlers.entries()) {
      try {
        await handler();
        logger.info(`Cleanup ${index + 1}/${this.handlers.length} (${name}) completed`);
      } catch (error) {
        failures++;
        logger.error(`Cleanup ${index + 1}/${this.handlers.length} (${name}) failed: ${errorMessage(error)}`);
      }
    }

    clearTimeout(timeout);
    logger.info(failures === 0 ? 'Graceful shutdown completed' : `Shutdown completed with ${failures} failed cleanup step(s)`);
    this.exit(exitCode);
  }

  /**
   * Get shutdown status
   */
  isShutdownInProgress(): boolean {
    return this.isShuttingDown;
  }
}

export const shutdownManager = new ShutdownManager();

/**
 * Register a cleanup handler
 */
export function onShutdown(name: string, handler: CleanupHandler): void {
  shutdownManager.registerHandler(name, handler);
}

/**
 * Register a step that must still run if cleanup overruns the timeout
 */
export function onForcedExit(name: string, handler: () => void): void {
  shutdownManager.registerForcedExitHandler(name, handler);
}

export function initializeGracefulShutdown(): void {
  shutdownManager.initialize();
  logger.info('Graceful shutdown handlers initialized');
}
