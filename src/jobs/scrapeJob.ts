import { Queue } from 'bullmq';
import IORedis from 'ioredis';
import { AppSettings, loadSettings } from '../config/settings';
import {
  QueueStats,
  RecentJob,
  SCRAPE_JOB,
  SCRAPE_QUEUE,
  ScrapeJobData,
  ScrapeJobResult
} from '../types/jobs';

/**
 * Job scheduler for borough scraping tasks
 */
export class ScrapeJobScheduler {
  private queue: Queue<ScrapeJobData, ScrapeJobResult>;
  private redis: IORedis;
  private settings: AppSettings;

  constructor(settings: AppSettings = loadSettings()) {
    this.settings = settings;

    // Initialize Redis connection
    this.redis = new IORedis(settings.redisUrl, {
      maxRetriesPerRequest: null, // Required for BullMQ blocking operations
      lazyConnect: true
    });

    // Initialize BullMQ queue
    this.queue = new Queue<ScrapeJobData, ScrapeJobResult>(SCRAPE_QUEUE, {
      connection: this.redis,
      defaultJobOptions: {
        removeOnComplete: 50,
        removeOnFail: 20,
        attempts: 2,
        backoff: {
          type: 'exponential',
          delay: 60000, // Start with 1 minute delay
        }
      }
    });

    console.log('Scrape job scheduler initialized');
  }

  /**
   * Add a one-time scraping job
   */
  async addScrapeJob(data: ScrapeJobData = {}, jobId?: string): Promise<string | undefined> {
    const job = await this.queue.add(SCRAPE_JOB, data, {
      jobId: jobId || `scrape-${Date.now()}`,
      attempts: 1,
      removeOnComplete: 5,
      removeOnFail: 3
    });

    console.log(`Added scraping job ${job.id}`);
    return job.id;
  }

  /**
   * Schedule the recurring scrape of every borough
   */
  async scheduleRecurringJobs(pattern: string = this.settings.scrapeCron): Promise<void> {
    // Remove any existing recurring jobs first
    await this.removeRecurringJobs();

    const job = await this.queue.add(
      SCRAPE_JOB,
      {},
      {
        repeat: {
          pattern,
          tz: this.settings.scrapeTimezone
        },
        jobId: 'recurring-scrape'
      }
    );

    console.log(`Scheduled recurring scraping job ${job.id} (${pattern}, ${this.settings.scrapeTimezone})`);
  }

  /**
   * Remove recurring scraping jobs
   */
  async removeRecurringJobs(): Promise<void> {
    const repeatableJobs = await this.queue.getRepeatableJobs();

    for (const job of repeatableJobs) {
      if (job.name === SCRAPE_JOB) {
        await this.queue.removeRepeatableByKey(job.key);
        console.log(`Removed recurring job: ${job.key}`);
      }
    }
  }

  /**
   * Get queue statistics
   */
  async getQueueStats(): Promise<QueueStats> {
    const counts = await this.queue.getJobCounts('waiting', 'active', 'completed', 'failed', 'delayed');

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0
    };
  }

  /**
   * Get recent job history, newest first
   */
  async getRecentJobs(limit: number = 10): Promise<RecentJob[]> {
    const [completed, failed, active] = await Promise.all([
      this.queue.getCompleted(0, limit),
      this.queue.getFailed(0, limit),
      this.queue.getActive()
    ]);

    const jobs: RecentJob[] = [
      ...completed.map(job => ({
        id: job.id ?? '',
        name: job.name,
        status: 'completed' as const,
        timestamp: new Date(job.finishedOn ?? job.timestamp),
        progress: 100
      })),
      ...failed.map(job => ({
        id: job.id ?? '',
        name: job.name,
        status: 'failed' as const,
        timestamp: new Date(job.finishedOn ?? job.timestamp),
        error: job.failedReason
      })),
      ...active.map(job => ({
        id: job.id ?? '',
        name: job.name,
        status: 'active' as const,
        timestamp: new Date(job.processedOn ?? job.timestamp),
        progress: typeof job.progress === 'number' ? job.progress : undefined
      }))
    ];

    return jobs
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
      .slice(0, limit);
  }

  /**
   * Clean up jobs older than a week
   */
  async cleanOldJobs(): Promise<void> {
    const oneWeek = 7 * 24 * 60 * 60 * 1000;

    await Promise.all([
      this.queue.clean(oneWeek, 100, 'completed'),
      this.queue.clean(oneWeek, 50, 'failed')
    ]);

    console.log('Cleaned up old jobs');
  }

  /**
   * Start the scheduler
   */
  async start(): Promise<void> {
    console.log('Starting job scheduler...');

    // Test Redis connection
    await this.redis.ping();

    await this.scheduleRecurringJobs();

    console.log('Job scheduler started');
  }

  /**
   * Shutdown the scheduler
   */
  async shutdown(): Promise<void> {
    console.log('Shutting down job scheduler...');

    try {
      await this.queue.close();
      this.redis.disconnect();
      console.log('Job scheduler shutdown complete');
    } catch (error) {
      console.error('Error during scheduler shutdown:', error);
    }
  }

  /**
   * Health check for the scheduler
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.redis.ping();
      return true;
    } catch (error) {
      console.error('Scheduler health check failed:', error);
      return false;
    }
  }
}
