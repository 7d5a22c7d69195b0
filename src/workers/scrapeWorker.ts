import { Worker, Job } from 'bullmq';
import IORedis from 'ioredis';
import { AppSettings, loadSettings } from '../config/settings';
import { DatabaseService } from '../services/database';
import { ScrapeOrchestrator } from '../services/scrapeOrchestrator';
import { SCRAPE_QUEUE, ScrapeJobData, ScrapeJobResult } from '../types/jobs';
import { BoroughScrapeResult } from '../types/planning';

export function summarizeResults(results: BoroughScrapeResult[]): ScrapeJobResult {
  return {
    boroughs: results.map(result => ({
      borough: result.borough,
      success: result.success,
      totalFound: result.totalFound,
      newApplications: result.newApplications,
      ...(result.error ? { error: result.error } : {})
    })),
    totalFound: results.reduce((sum, result) => sum + result.totalFound, 0),
    newApplications: results.reduce((sum, result) => sum + result.newApplications, 0)
  };
}

/**
 * BullMQ worker for processing borough scraping jobs
 */
export class ScrapeWorker {
  private worker: Worker<ScrapeJobData, ScrapeJobResult>;
  private redis: IORedis;
  private orchestrator: ScrapeOrchestrator;

  constructor(settings: AppSettings = loadSettings(), orchestrator?: ScrapeOrchestrator) {
    // Initialize Redis connection
    this.redis = new IORedis(settings.redisUrl, {
      maxRetriesPerRequest: null, // Required for BullMQ blocking operations
      lazyConnect: true
    });

    this.orchestrator = orchestrator ?? new ScrapeOrchestrator({
      store: new DatabaseService({ url: settings.supabaseUrl, serviceRoleKey: settings.supabaseServiceRoleKey }),
      settings: settings.scraping
    });

    // Create BullMQ worker
    this.worker = new Worker<ScrapeJobData, ScrapeJobResult>(SCRAPE_QUEUE, this.processJob.bind(this), {
      connection: this.redis,
      concurrency: 1,
      maxStalledCount: 3,              // Retry stalled jobs up to 3 times
      stalledInterval: 30 * 1000,      // Check for stalled jobs every 30 seconds
      lockDuration: 30 * 60 * 1000,    // A full run across every borough can take a while
    });

    this.setupEventHandlers();
    console.log('Scrape worker initialized');
  }

  /**
   * Process a scraping job
   */
  async processJob(job: Job<ScrapeJobData, ScrapeJobResult>): Promise<ScrapeJobResult> {
    console.log(`Starting scraping job ${job.id} at ${new Date().toISOString()}`);
    await job.updateProgress(5);

    const requested = job.data.boroughs ?? [];
    const total = requested.length > 0 ? requested.length : this.orchestrator.boroughNames.length;
    const finished = new Set<string>();

    const unsubscribe = this.orchestrator.onStatus(status => {
      if ((status.state === 'completed' || status.state === 'error') && !finished.has(status.borough)) {
        finished.add(status.borough);
        const progress = Math.min(95, 5 + Math.round((finished.size / Math.max(1, total)) * 90));
        job.updateProgress(progress).catch(error => {
          console.error(`Failed to update progress for job ${job.id}:`, error);
        });
      }
    });

    let results: BoroughScrapeResult[];
    try {
      results = requested.length > 0
        ? await this.orchestrator.scrapeSpecific(requested, job.data.keywords)
        : await this.orchestrator.scrapeAll(job.data.keywords);
    } finally {
      unsubscribe();
    }

    const summary = summarizeResults(results);
    const failed = results.filter(result => !result.success);

    if (results.length > 0 && failed.length === results.length) {
      const reasons = failed.map(result => `${result.borough}: ${result.error ?? 'unknown error'}`).join('; ');
      throw new Error(`All borough scrapes failed (${reasons})`);
    }

    await job.updateProgress(100);
    console.log(
      `Scraping job ${job.id} completed: ${summary.totalFound} matches, ${summary.newApplications} new, ${failed.length} boroughs failed`
    );
    return summary;
  }

  /**
   * Set up event handlers for the worker
   */
  private setupEventHandlers(): void {
    this.worker.on('completed', (job) => {
      console.log(`Job ${job.id} completed successfully`);
    });

    this.worker.on('failed', (job, err) => {
      console.error(`Job ${job?.id} failed:`, err.message);
    });

    this.worker.on('error', (err) => {
      console.error('Worker error:', err);
    });

    this.worker.on('stalled', (jobId) => {
      console.warn(`Job ${jobId} stalled`);
    });
  }

  /**
   * Start the worker
   */
  async start(): Promise<void> {
    console.log('Starting scrape worker...');
    // Worker starts processing when created; wait for Redis
    await this.redis.ping();
    console.log('Scrape worker started and connected to Redis');
  }

  /**
   * Gracefully shutdown the worker, letting running boroughs finish their current keyword
   */
  async shutdown(): Promise<void> {
    console.log('Shutting down scrape worker...');
    this.orchestrator.stop();

    try {
      await this.worker.close();
      this.redis.disconnect();
      console.log('Scrape worker shutdown complete');
    } catch (error) {
      console.error('Error during worker shutdown:', error);
    }
  }

  /**
   * Check worker health
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.redis.ping();
      return !this.worker.closing;
    } catch (error) {
      console.error('Worker health check failed:', error);
      return false;
    }
  }
}
