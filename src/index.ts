import dotenv from 'dotenv';
import { AppSettings, loadSettings } from './config/settings';
import { ScrapeJobScheduler } from './jobs/scrapeJob';
import { QueueStats, RecentJob } from './types/jobs';
import { ScrapeWorker } from './workers/scrapeWorker';

// Load environment variables
dotenv.config();

export interface AppStatus {
  worker: boolean;
  scheduler: boolean;
  queueStats: QueueStats;
  recentJobs: RecentJob[];
}

/**
 * Main application entry point
 * Starts the BullMQ worker and job scheduler for planning portal scraping
 */
class PlanningMonitorApp {
  private worker: ScrapeWorker;
  private scheduler: ScrapeJobScheduler;
  private settings: AppSettings;
  private isShuttingDown = false;
  private timers: NodeJS.Timeout[] = [];

  constructor(settings: AppSettings = loadSettings()) {
    this.settings = settings;
    this.worker = new ScrapeWorker(settings);
    this.scheduler = new ScrapeJobScheduler(settings);
  }

  /**
   * Start the application
   */
  async start(): Promise<void> {
    console.log('🏛️  Starting London Planning Monitor...');
    console.log(`Environment: ${process.env.NODE_ENV || 'development'}`);

    this.setupGracefulShutdown();

    try {
      await this.scheduler.start();
      await this.worker.start();

      // Add an immediate job to check the pipeline end to end
      if (process.env.NODE_ENV !== 'production') {
        console.log('Adding startup scraping job...');
        await this.scheduler.addScrapeJob({}, 'startup-scrape');
      }

      console.log('✅ London Planning Monitor started successfully');
      console.log(`Boroughs will be scraped on schedule "${this.settings.scrapeCron}" (${this.settings.scrapeTimezone})`);

      this.keepAlive();
    } catch (error) {
      console.error('❌ Failed to start application:', error);
      await this.shutdown();
      process.exit(1);
    }
  }

  /**
   * Set up graceful shutdown handlers
   */
  private setupGracefulShutdown(): void {
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];

    signals.forEach(signal => {
      process.on(signal, () => {
        if (this.isShuttingDown) {
          console.log(`Received ${signal} again, forcing exit...`);
          process.exit(1);
        }

        console.log(`\nReceived ${signal}, starting graceful shutdown...`);
        this.exitAfterShutdown(0);
      });
    });

    process.on('uncaughtException', (error) => {
      console.error('Uncaught Exception:', error);
      this.exitAfterShutdown(1);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('Unhandled Rejection:', reason);
      this.exitAfterShutdown(1);
    });
  }

  private exitAfterShutdown(code: number): void {
    this.shutdown()
      .then(() => process.exit(code))
      .catch(error => {
        console.error('❌ Error during shutdown:', error);
        process.exit(1);
      });
  }

  /**
   * Periodic health logging and queue cleanup
   */
  private keepAlive(): void {
    // Log health status every 30 minutes
    this.timers.push(setInterval(() => {
      this.logHealth().catch(error => {
        console.error('❌ Health check failed:', error);
      });
    }, 30 * 60 * 1000));

    // Clean up old jobs daily
    this.timers.push(setInterval(() => {
      this.scheduler.cleanOldJobs().catch(error => {
        console.error('Failed to clean old jobs:', error);
      });
    }, 24 * 60 * 60 * 1000));
  }

  private async logHealth(): Promise<void> {
    const status = await this.getStatus();

    if (status.worker && status.scheduler) {
      console.log('💚 Health check passed - Application running normally');
      const stats = status.queueStats;
      console.log(`Queue stats - Waiting: ${stats.waiting}, Active: ${stats.active}, Completed: ${stats.completed}, Failed: ${stats.failed}`);
    } else {
      console.warn('⚠️  Health check warning - Some components unhealthy');
      console.log(`Worker healthy: ${status.worker}, Scheduler healthy: ${status.scheduler}`);
    }
  }

  /**
   * Shutdown the application gracefully
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;
    console.log('🔄 Shutting down London Planning Monitor...');

    this.timers.forEach(timer => clearInterval(timer));
    this.timers = [];

    await Promise.all([
      this.worker.shutdown(),
      this.scheduler.shutdown()
    ]);

    console.log('✅ Application shutdown complete');
  }

  /**
   * Get application status
   */
  async getStatus(): Promise<AppStatus> {
    const [workerHealthy, schedulerHealthy, queueStats, recentJobs] = await Promise.all([
      this.worker.healthCheck(),
      this.scheduler.healthCheck(),
      this.scheduler.getQueueStats(),
      this.scheduler.getRecentJobs(5)
    ]);

    return {
      worker: workerHealthy,
      scheduler: schedulerHealthy,
      queueStats,
      recentJobs
    };
  }
}

// Start the application if this file is run directly
if (require.main === module) {
  const app = new PlanningMonitorApp();
  app.start().catch((error) => {
    console.error('Failed to start application:', error);
    process.exit(1);
  });
}

export { PlanningMonitorApp };
