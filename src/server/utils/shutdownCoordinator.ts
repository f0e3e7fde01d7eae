import { logger } from './logger.js';

type ShutdownHandler = () => Promise<void> | void;

interface CleanupOperation {
  name: string;
  handler: ShutdownHandler;
}

/**
 * Runs registered cleanup operations once, in registration order.
 * A failing operation is logged and the rest still run.
 */
export class ShutdownCoordinator {
  private readonly cleanupOperations: CleanupOperation[] = [];
  private shuttingDown = false;

  constructor(private readonly shutdownTimeoutMs: number = 10000) {}

  register(name: string, handler: ShutdownHandler): void {
    this.cleanupOperations.push({ name, handler });
  }

  /**
   * @returns false when the operations did not finish within the shutdown timeout
   */
  async shutdown(signal?: string): Promise<boolean> {
    if (this.shuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress');
      return true;
    }
    this.shuttingDown = true;
    logger.info({ signal, operationsCount: this.cleanupOperations.length }, 'Starting graceful shutdown');

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), this.shutdownTimeoutMs);
    });

    const completed = (async (): Promise<true> => {
      for (const operation of this.cleanupOperations) {
        await this.executeOperation(operation);
      }
      return true;
    })();

    const finished = await Promise.race([completed, timedOut]);
    clearTimeout(timer);

    if (finished) {
      logger.info('Graceful shutdown completed successfully');
    } else {
      logger.error({ timeoutMs: this.shutdownTimeoutMs }, 'Graceful shutdown timed out');
    }
    return finished;
  }

  private async executeOperation({ name, handler }: CleanupOperation): Promise<void> {
    try {
      await handler();
      logger.debug({ operation: name }, 'Cleanup operation completed');
    } catch (error) {
      logger.error({ error, operation: name }, 'Error during cleanup operation (continuing with shutdown)');
    }
  }
}
