import { MONITORING_KEYWORDS } from '../config/boroughs';
import {
  ApplicationStore,
  BoroughConfig,
  BoroughScrapeResult,
  ListingCandidate,
  PlanningApplication,
  ScrapeSession
} from '../types/planning';
import { Sleep, sleep as defaultSleep } from '../utils/delay';
import { detectKeywords } from './keywordDetector';
import { PortalSearcher } from './portalSearcher';
import { StatusReporter } from './scrapeStatus';

export type BoroughScraperState = 'idle' | 'running' | 'completed' | 'error';

export interface CancellationSignal {
  isCancelled(): boolean;
}

export interface BoroughScraperOptions {
  config: BoroughConfig;
  searcher: PortalSearcher;
  store: ApplicationStore;
  keywordDelayMs: number;
  maxCandidatesPerBorough: number;
  reporter?: StatusReporter;
  cancellation?: CancellationSignal;
  sleep?: Sleep;
  now?: () => Date;
}

export const SCRAPING_STOPPED = 'Scraping stopped';

const NO_REPORTER: StatusReporter = { update: () => undefined };
const NEVER_CANCELLED: CancellationSignal = { isCancelled: () => false };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs every keyword against one borough's portal and stores the matching applications
 */
export class BoroughScraper {
  private readonly config: BoroughConfig;
  private readonly searcher: PortalSearcher;
  private readonly store: ApplicationStore;
  private readonly keywordDelayMs: number;
  private readonly maxCandidates: number;
  private readonly reporter: StatusReporter;
  private readonly cancellation: CancellationSignal;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private currentState: BoroughScraperState = 'idle';
  private pagesProcessed = 0;

  constructor(options: BoroughScraperOptions) {
    this.config = options.config;
    this.searcher = options.searcher;
    this.store = options.store;
    this.keywordDelayMs = options.keywordDelayMs;
    this.maxCandidates = options.maxCandidatesPerBorough;
    this.reporter = options.reporter ?? NO_REPORTER;
    this.cancellation = options.cancellation ?? NEVER_CANCELLED;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  get state(): BoroughScraperState {
    return this.currentState;
  }

  get borough(): string {
    return this.config.name;
  }

  async scrape(keywords: readonly string[] = MONITORING_KEYWORDS): Promise<BoroughScrapeResult> {
    const startedAt = this.now();

    if (this.currentState === 'running') {
      return this.failedResult(startedAt, 'Scrape already running');
    }

    this.currentState = 'running';
    this.pagesProcessed = 0;
    this.reporter.update({
      state: 'running',
      currentKeyword: null,
      keywordIndex: 0,
      keywordTotal: keywords.length,
      requestsMade: this.searcher.requestsMade,
      pagesProcessed: 0,
      applicationsFound: 0,
      lastError: null
    });
    console.log(`[${this.borough}] Starting scrape for ${keywords.length} keywords`);

    let sessionLogged = false;
    const logSession = async (session: ScrapeSession): Promise<void> => {
      if (sessionLogged) {
        return;
      }
      sessionLogged = true;
      await this.store.logSession(session);
    };

    try {
      const { applications: collected, stopped } = await this.collect(keywords);
      const applications = this.dedupeByProjectId(collected);
      const counts = await this.store.bulkInsert(applications);
      const completedAt = this.now();

      await logSession({
        borough: this.borough,
        keywords: [...keywords],
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        recordsFound: applications.length,
        recordsNew: counts.new,
        requestsMade: this.searcher.requestsMade,
        status: stopped ? 'error' : 'success',
        ...(stopped ? { errorMessage: SCRAPING_STOPPED } : {})
      });

      this.currentState = stopped ? 'error' : 'completed';
      this.reporter.update({
        state: this.currentState,
        currentKeyword: null,
        requestsMade: this.searcher.requestsMade,
        applicationsFound: applications.length,
        lastError: stopped ? SCRAPING_STOPPED : null,
        lastRun: completedAt.toISOString()
      });
      console.log(
        `[${this.borough}] Found ${applications.length} matching applications (${counts.new} new, ${this.searcher.requestsMade} requests)`
      );

      return {
        borough: this.borough,
        success: !stopped,
        totalFound: applications.length,
        newApplications: counts.new,
        requestsMade: this.searcher.requestsMade,
        duration: completedAt.getTime() - startedAt.getTime(),
        applications,
        ...(stopped ? { error: SCRAPING_STOPPED } : {})
      };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[${this.borough}] Scrape failed:`, message);

      try {
        await logSession({
          borough: this.borough,
          keywords: [...keywords],
          startedAt: startedAt.toISOString(),
          completedAt: this.now().toISOString(),
          recordsFound: 0,
          recordsNew: 0,
          requestsMade: this.searcher.requestsMade,
          status: 'error',
          errorMessage: message
        });
      } catch (logError) {
        console.error(`[${this.borough}] Failed to record scrape session:`, errorMessage(logError));
      }

      this.currentState = 'error';
      this.reporter.update({ state: 'error', currentKeyword: null, lastError: message, lastRun: this.now().toISOString() });
      return this.failedResult(startedAt, message);
    } finally {
      try {
        await this.searcher.shutdown();
      } catch (error) {
        console.error(`[${this.borough}] Error shutting down searcher:`, errorMessage(error));
      }
    }
  }

  private async collect(keywords: readonly string[]): Promise<{ applications: PlanningApplication[]; stopped: boolean }> {
    const seen = new Set<string>();
    const applications: PlanningApplication[] = [];

    for (let index = 0; index < keywords.length; index++) {
      if (this.cancellation.isCancelled()) {
        console.log(`[${this.borough}] Stop requested, skipping remaining keywords`);
        return { applications, stopped: true };
      }

      if (seen.size >= this.maxCandidates) {
        console.log(`[${this.borough}] Candidate limit reached, skipping remaining ${keywords.length - index} keywords`);
        break;
      }

      if (index > 0 && this.keywordDelayMs > 0) {
        await this.sleep(this.keywordDelayMs);
      }

      const keyword = keywords[index];
      this.reporter.update({
        currentKeyword: keyword,
        keywordIndex: index + 1,
        requestsMade: this.searcher.requestsMade
      });

      try {
        await this.processKeyword(keyword, keywords, seen, applications);
      } catch (error) {
        const message = errorMessage(error);
        console.error(`[${this.borough}] Error searching for '${keyword}':`, message);
        this.reporter.update({ lastError: message });
      }
    }

    return { applications, stopped: false };
  }

  private async processKeyword(
    keyword: string,
    keywords: readonly string[],
    seen: Set<string>,
    applications: PlanningApplication[]
  ): Promise<void> {
    const listing = await this.searcher.search(keyword);
    this.pagesProcessed++;
    this.reporter.update({ pagesProcessed: this.pagesProcessed, requestsMade: this.searcher.requestsMade });

    switch (listing.outcome) {
      case 'too_many_results':
        console.log(`[${this.borough}] Too many results for '${keyword}', skipping`);
        return;
      case 'no_results':
        console.log(`[${this.borough}] No results for '${keyword}'`);
        return;
      case 'missing_structure':
        console.warn(`[${this.borough}] No results listing found for '${keyword}'`);
        return;
      case 'unavailable':
        console.warn(`[${this.borough}] Search for '${keyword}' returned no response`);
        return;
      case 'results':
        break;
    }

    console.log(`[${this.borough}] ${listing.candidates.length} candidates for '${keyword}'`);

    for (const candidate of listing.candidates) {
      if (seen.has(candidate.candidateId)) {
        continue;
      }
      if (seen.size >= this.maxCandidates) {
        console.log(`[${this.borough}] Reached ${this.maxCandidates} candidate limit`);
        return;
      }
      seen.add(candidate.candidateId);

      try {
        const application = await this.classify(candidate, keywords, listing.sourceUrl);
        if (application) {
          applications.push(application);
          this.reporter.update({ applicationsFound: applications.length });
        }
      } catch (error) {
        console.error(`[${this.borough}] Error processing ${candidate.candidateId}:`, errorMessage(error));
      }
    }
  }

  private async classify(
    candidate: ListingCandidate,
    keywords: readonly string[],
    sourceUrl: string
  ): Promise<PlanningApplication | null> {
    const detailText = await this.searcher.fetchDetail(candidate.detailUrl);
    this.pagesProcessed++;
    this.reporter.update({ pagesProcessed: this.pagesProcessed, requestsMade: this.searcher.requestsMade });

    const detected = detectKeywords(`${candidate.titleHint} ${candidate.addressHint} ${detailText}`, keywords);
    if (detected.length === 0) {
      return null;
    }

    return {
      projectId: candidate.candidateId,
      borough: this.borough,
      title: candidate.titleHint,
      address: candidate.addressHint,
      submissionDate: candidate.submittedHint,
      applicationUrl: candidate.detailUrl,
      detectedKeywords: detected,
      sourceUrl,
      scrapedTimestamp: this.now().toISOString()
    };
  }

  private dedupeByProjectId(applications: PlanningApplication[]): PlanningApplication[] {
    const seen = new Set<string>();
    return applications.filter(application => {
      if (seen.has(application.projectId)) {
        return false;
      }
      seen.add(application.projectId);
      return true;
    });
  }

  private failedResult(startedAt: Date, error: string): BoroughScrapeResult {
    return {
      borough: this.borough,
      success: false,
      totalFound: 0,
      newApplications: 0,
      requestsMade: this.searcher.requestsMade,
      duration: this.now().getTime() - startedAt.getTime(),
      applications: [],
      error
    };
  }
}
