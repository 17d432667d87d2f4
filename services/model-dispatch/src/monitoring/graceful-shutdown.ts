export interface CleanupTask {
  name: string;
  run: () => Promise<void>;
}

export interface ShutdownOptions {
  timeout: number; // milliseconds
  forceExit: boolean;
  handleSignals: boolean;
  cleanupTasks: CleanupTask[];
}

/**
 * Runs registered cleanup tasks in order (stop HTTP listener, stop workers,
 * close the queue) when the process is asked to stop.
 */
export class GracefulShutdown {
  private isShuttingDown: boolean = false;
  private shutdownTimeout: NodeJS.Timeout | null = null;
  private readonly options: ShutdownOptions;

  constructor(options: Partial<ShutdownOptions> = {}) {
    this.options = {
      timeout: 30000,
      forceExit: true,
      handleSignals: true,
      cleanupTasks: [],
      ...options
    };

    if (this.options.handleSignals) {
      this.setupSignalHandlers();
    }
  }

  private setupSignalHandlers(): void {
    // Handle SIGTERM (Docker, Kubernetes)
    process.on('SIGTERM', () => {
      console.log('Received SIGTERM signal');
      void this.shutdown('SIGTERM');
    });

    // Handle SIGINT (Ctrl+C)
    process.on('SIGINT', () => {
      console.log('Received SIGINT signal');
      void this.shutdown('SIGINT');
    });

    process.on('uncaughtException', (error) => {
      console.error('Uncaught Exception:', error);
      void this.shutdown('uncaughtException', error);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('Unhandled Rejection, reason:', reason);
      void this.shutdown('unhandledRejection', reason);
    });
  }

  addCleanupTask(name: string, run: () => Promise<void>): void {
    this.options.cleanupTasks.push({ name, run });
  }

  /**
   * Run every cleanup task once. Returns the names of tasks that failed.
   * With forceExit the process exits afterwards (1 when triggered by an error or a failed task).
   */
  async shutdown(signal: string, error?: unknown): Promise<string[]> {
    if (this.isShuttingDown) {
      console.log('Shutdown already in progress, ignoring signal:', signal);
      return [];
    }

    this.isShuttingDown = true;
    console.log(`🛑 Initiating graceful shutdown due to: ${signal}`);

    this.shutdownTimeout = setTimeout(() => {
      console.error('Shutdown timeout reached, forcing exit');
      if (this.options.forceExit) {
        process.exit(1);
      }
    }, this.options.timeout);
    this.shutdownTimeout.unref();

    const failed = await this.executeCleanupTasks();

    if (this.shutdownTimeout) {
      clearTimeout(this.shutdownTimeout);
      this.shutdownTimeout = null;
    }

    if (failed.length === 0) {
      console.log('✅ Graceful shutdown completed successfully');
    } else {
      console.error(`Graceful shutdown finished with failed tasks: ${failed.join(', ')}`);
    }

    if (this.options.forceExit) {
      process.exit(error !== undefined || failed.length > 0 ? 1 : 0);
    }
    return failed;
  }

  private async executeCleanupTasks(): Promise<string[]> {
    const tasks = this.options.cleanupTasks;
    const failed: string[] = [];

    for (let i = 0; i < tasks.length; i++) {
      const task = tasks[i];
      try {
        console.log(`Executing cleanup task ${i + 1}/${tasks.length}: ${task.name}`);
        await task.run();
      } catch (taskError) {
        console.error(`Cleanup task ${task.name} failed:`, taskError);
        failed.push(task.name);
      }
    }

    return failed;
  }

  getShutdownStatus(): { isShuttingDown: boolean; timeout: number; tasks: string[] } {
    return {
      isShuttingDown: this.isShuttingDown,
      timeout: this.options.timeout,
      tasks: this.options.cleanupTasks.map(task => task.name)
    };
  }
}
