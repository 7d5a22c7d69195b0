import { EventEmitter } from 'events';
import { ScrapeStatus } from '../types/planning';

export type StatusPatch = Partial<Omit<ScrapeStatus, 'borough' | 'updatedAt'>>;
export type StatusListener = (status: ScrapeStatus) => void;

/**
 * Write handle for a single borough's entry
 */
export interface StatusReporter {
  update(patch: StatusPatch): void;
}

function initialStatus(borough: string, now: Date): ScrapeStatus {
  return {
    borough,
    state: 'initialized',
    currentKeyword: null,
    keywordIndex: 0,
    keywordTotal: 0,
    requestsMade: 0,
    pagesProcessed: 0,
    applicationsFound: 0,
    lastError: null,
    lastRun: null,
    updatedAt: now.toISOString()
  };
}

/**
 * Per-borough status map owned by one orchestrator.
 * Each borough's scraper only writes its own key.
 */
export class ScrapeStatusTracker {
  private readonly statuses: Map<string, ScrapeStatus> = new Map();
  private readonly events = new EventEmitter();

  constructor(private readonly now: () => Date = () => new Date()) {}

  register(borough: string): void {
    if (!this.statuses.has(borough)) {
      this.statuses.set(borough, initialStatus(borough, this.now()));
    }
  }

  update(borough: string, patch: StatusPatch): ScrapeStatus {
    const current = this.statuses.get(borough) ?? initialStatus(borough, this.now());
    const next: ScrapeStatus = { ...current, ...patch, borough, updatedAt: this.now().toISOString() };
    this.statuses.set(borough, next);

    try {
      this.events.emit('status', { ...next });
    } catch (error) {
      console.error(`Status listener failed for ${borough}:`, error instanceof Error ? error.message : error);
    }

    return next;
  }

  reporter(borough: string): StatusReporter {
    this.register(borough);
    return { update: patch => { this.update(borough, patch); } };
  }

  get(borough: string): ScrapeStatus | undefined {
    const status = this.statuses.get(borough);
    return status ? { ...status } : undefined;
  }

  snapshot(): Record<string, ScrapeStatus> {
    const result: Record<string, ScrapeStatus> = {};
    for (const [borough, status] of this.statuses) {
      result[borough] = { ...status };
    }
    return result;
  }

  /**
   * Subscribe to every status change; returns the unsubscribe function
   */
  onStatus(listener: StatusListener): () => void {
    this.events.on('status', listener);
    return () => {
      this.events.off('status', listener);
    };
  }
}
