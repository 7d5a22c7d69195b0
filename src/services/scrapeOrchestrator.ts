import pLimit from 'p-limit';
import { BOROUGH_CONFIGS, findBoroughConfig, MONITORING_KEYWORDS } from '../config/boroughs';
import { DEFAULT_SCRAPING_SETTINGS, ScrapingSettings } from '../config/settings';
import {
  ApplicationStore,
  BoroughConfig,
  BoroughScrapeResult,
  ScrapeStatus,
  StoreStatistics
} from '../types/planning';
import { Sleep, sleep as defaultSleep } from '../utils/delay';
import { BoroughScraper, SCRAPING_STOPPED } from './boroughScraper';
import { createPortalSearcher, PortalSearcher } from './portalSearcher';
import { ScrapeStatusTracker, StatusListener } from './scrapeStatus';

export type SearcherFactory = (config: BoroughConfig, settings: ScrapingSettings) => PortalSearcher;

export interface ScrapeOrchestratorOptions {
  store: ApplicationStore;
  settings?: ScrapingSettings;
  boroughs?: BoroughConfig[];
  keywords?: string[];
  createSearcher?: SearcherFactory;
  sleep?: Sleep;
  now?: () => Date;
}

export interface OrchestratorStatus {
  boroughs: Record<string, ScrapeStatus>;
  totalBoroughs: number;
  activeBoroughs: number;
  completedBoroughs: number;
  errorBoroughs: number;
  completionPercent: number;
  isRunning: boolean;
  statistics: StoreStatistics | null;
}

export function failedResult(borough: string, error: string): BoroughScrapeResult {
  return {
    borough,
    success: false,
    totalFound: 0,
    newApplications: 0,
    requestsMade: 0,
    duration: 0,
    applications: [],
    error
  };
}

/**
 * Fans borough scrapes out over a bounded pool and keeps their live status
 */
export class ScrapeOrchestrator {
  private readonly store: ApplicationStore;
  private readonly settings: ScrapingSettings;
  private readonly boroughs: BoroughConfig[];
  private readonly keywords: string[];
  private readonly createSearcher: SearcherFactory;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly tracker: ScrapeStatusTracker;
  private stopRequested = false;
  private activeRuns = 0;

  constructor(options: ScrapeOrchestratorOptions) {
    this.store = options.store;
    this.settings = options.settings ?? DEFAULT_SCRAPING_SETTINGS;
    this.boroughs = options.boroughs ?? BOROUGH_CONFIGS;
    this.keywords = options.keywords ?? MONITORING_KEYWORDS;
    this.createSearcher = options.createSearcher ?? createPortalSearcher;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.tracker = new ScrapeStatusTracker(this.now);

    for (const borough of this.boroughs) {
      this.tracker.register(borough.name);
    }
  }

  get boroughNames(): string[] {
    return this.boroughs.map(borough => borough.name);
  }

  get isRunning(): boolean {
    return this.activeRuns > 0;
  }

  /**
   * Scrape every configured borough, at most maxParallel at a time.
   * Results arrive in completion order; a failing borough yields a failed result.
   */
  async scrapeAll(
    keywords: string[] = this.keywords,
    maxParallel: number = this.settings.maxParallelBoroughs
  ): Promise<BoroughScrapeResult[]> {
    this.resetStopFlag();
    console.log(`🚀 Scraping ${this.boroughs.length} boroughs (max ${maxParallel} in parallel)`);

    const limit = pLimit(Math.max(1, maxParallel));
    const results: BoroughScrapeResult[] = [];

    await Promise.all(
      this.boroughs.map(borough =>
        limit(async () => {
          results.push(await this.runBorough(borough, keywords));
        })
      )
    );

    this.logSummary(results);
    return results;
  }

  async scrapeOne(boroughName: string, keywords: string[] = this.keywords): Promise<BoroughScrapeResult> {
    const config = findBoroughConfig(boroughName, this.boroughs);
    if (!config) {
      console.error(`No scraper available for ${boroughName}`);
      return failedResult(boroughName, `No scraper available for ${boroughName}`);
    }

    this.resetStopFlag();
    return this.runBorough(config, keywords);
  }

  /**
   * Scrape the named boroughs one after another
   */
  async scrapeSpecific(boroughNames: string[], keywords: string[] = this.keywords): Promise<BoroughScrapeResult[]> {
    this.resetStopFlag();
    const results: BoroughScrapeResult[] = [];

    for (const name of boroughNames) {
      const config = findBoroughConfig(name, this.boroughs);
      if (!config) {
        console.error(`No scraper available for ${name}`);
        results.push(failedResult(name, `No scraper available for ${name}`));
        continue;
      }
      results.push(await this.runBorough(config, keywords));
    }

    this.logSummary(results);
    return results;
  }

  /**
   * Ask running scrapes to finish after their current keyword
   */
  stop(): void {
    if (!this.stopRequested) {
      console.log('🛑 Stop requested, boroughs will finish their current keyword');
    }
    this.stopRequested = true;
  }

  async status(): Promise<OrchestratorStatus> {
    const boroughs = this.tracker.snapshot();
    const states = Object.values(boroughs).map(status => status.state);
    const completed = states.filter(state => state === 'completed').length;
    const errored = states.filter(state => state === 'error').length;
    const total = states.length;

    let statistics: StoreStatistics | null = null;
    try {
      statistics = await this.store.statistics();
    } catch (error) {
      console.error('Failed to load storage statistics:', error instanceof Error ? error.message : error);
    }

    return {
      boroughs,
      totalBoroughs: total,
      activeBoroughs: states.filter(state => state === 'running').length,
      completedBoroughs: completed,
      errorBoroughs: errored,
      completionPercent: total > 0 ? ((completed + errored) / total) * 100 : 0,
      isRunning: this.isRunning,
      statistics
    };
  }

  onStatus(listener: StatusListener): () => void {
    return this.tracker.onStatus(listener);
  }

  private resetStopFlag(): void {
    if (this.activeRuns === 0) {
      this.stopRequested = false;
    }
  }

  private async runBorough(config: BoroughConfig, keywords: string[]): Promise<BoroughScrapeResult> {
    if (this.stopRequested) {
      this.tracker.update(config.name, { state: 'error', lastError: SCRAPING_STOPPED });
      return failedResult(config.name, SCRAPING_STOPPED);
    }

    this.activeRuns++;
    try {
      const scraper = new BoroughScraper({
        config,
        searcher: this.createSearcher(config, this.settings),
        store: this.store,
        keywordDelayMs: this.settings.keywordDelayMs,
        maxCandidatesPerBorough: this.settings.maxCandidatesPerBorough,
        reporter: this.tracker.reporter(config.name),
        cancellation: { isCancelled: () => this.stopRequested },
        sleep: this.sleep,
        now: this.now
      });
      return await scraper.scrape(keywords);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[${config.name}] Worker failed:`, message);
      this.tracker.update(config.name, { state: 'error', currentKeyword: null, lastError: message });
      return failedResult(config.name, message);
    } finally {
      this.activeRuns--;
    }
  }

  private logSummary(results: BoroughScrapeResult[]): void {
    const succeeded = results.filter(result => result.success).length;
    const found = results.reduce((sum, result) => sum + result.totalFound, 0);
    const added = results.reduce((sum, result) => sum + result.newApplications, 0);
    console.log(`✅ ${succeeded}/${results.length} boroughs succeeded: ${found} matches, ${added} new`);
  }
}
