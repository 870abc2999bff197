export interface ShutdownOptions {
  timeout: number; // milliseconds
  forceExit: boolean;
  exit: (code: number) => void;
}

interface CleanupTask {
  name: string;
  run: () => Promise<void>;
}

export class GracefulShutdown {
  private isShuttingDown: boolean = false;
  private shutdownTimeout: NodeJS.Timeout | null = null;
  private readonly options: ShutdownOptions;
  private readonly cleanupTasks: CleanupTask[] = [];

  constructor(options: Partial<ShutdownOptions> = {}) {
    this.options = {
      timeout: 30000,
      forceExit: true,
      exit: (code) => process.exit(code),
      ...options,
    };
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  setupSignalHandlers(): void {
    // Docker, Kubernetes, Cloud Run
    process.on('SIGTERM', () => {
      console.log('Received SIGTERM signal');
      void this.shutdown('SIGTERM');
    });

    // Ctrl+C
    process.on('SIGINT', () => {
      console.log('Received SIGINT signal');
      void this.shutdown('SIGINT');
    });

    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void this.shutdown('uncaughtException', error);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
      void this.shutdown('unhandledRejection', reason);
    });
  }

  /**
   * Tasks run in the order they were added.
   */
  addCleanupTask(name: string, run: () => Promise<void>): void {
    this.cleanupTasks.push({ name, run });
  }

  async shutdown(signal: string, error?: unknown): Promise<void> {
    if (this.isShuttingDown) {
      console.log('Shutdown already in progress, ignoring signal:', signal);
      return;
    }

    this.isShuttingDown = true;
    console.log(`🛑 Initiating graceful shutdown due to: ${signal}`);

    this.shutdownTimeout = setTimeout(() => {
      console.error('Shutdown timeout reached, forcing exit');
      if (this.options.forceExit) {
        this.options.exit(1);
      }
    }, this.options.timeout);
    this.shutdownTimeout.unref();

    const failures = await this.executeCleanupTasks();

    if (this.shutdownTimeout) {
      clearTimeout(this.shutdownTimeout);
      this.shutdownTimeout = null;
    }

    console.log(failures === 0 ? '✅ Graceful shutdown completed' : `⚠️ Shutdown completed with ${failures} failed task(s)`);
    this.options.exit(error !== undefined || failures > 0 ? 1 : 0);
  }

  /**
   * Returns the number of tasks that failed. A failed task does not stop the
   * ones after it.
   */
  private async executeCleanupTasks(): Promise<number> {
    let failures = 0;
    for (const task of this.cleanupTasks) {
      try {
        console.log(`🧹 ${task.name}...`);
        await task.run();
      } catch (error) {
        failures++;
        console.error(`Cleanup task "${task.name}" failed:`, error);
      }
    }
    return failures;
  }

  isShuttingDownInProgress(): boolean {
    return this.isShuttingDown;
  }
}
