/**
 * Planning application matched against the monitoring keywords
 */
export interface PlanningApplication {
  projectId: string;
  borough: string;
  title: string;
  address: string;
  submissionDate: string | null;
  applicationUrl: string;
  detectedKeywords: string[];
  sourceUrl: string;
  scrapedTimestamp: string;
}

/**
 * Database record structure matching the planning_applications table
 */
export interface ApplicationRecord {
  id?: number;
  project_id: string;
  borough: string;
  title: string | null;
  address: string | null;
  submission_date: string | null;
  application_url: string | null;
  detected_keywords: string[];
  source_url: string | null;
  scraped_timestamp: string;
  created_at?: string;
}

export type PortalFamily = 'tabular' | 'result_card';

export interface BoroughConfig {
  name: string;
  baseUrl: string;
  searchUrl: string;
  portalFamily: PortalFamily;
}

/**
 * Row or card extracted from a search results listing, before its detail page is read
 */
export interface ListingCandidate {
  candidateId: string;
  detailUrl: string;
  titleHint: string;
  addressHint: string;
  submittedHint: string | null;
}

export type ListingOutcome =
  | 'results'
  | 'no_results'
  | 'too_many_results'
  | 'missing_structure'
  | 'unavailable';

export interface ListingResult {
  outcome: ListingOutcome;
  candidates: ListingCandidate[];
}

export type SessionStatus = 'success' | 'error';

/**
 * One borough scrape as written to the scraping_logs table
 */
export interface ScrapeSession {
  borough: string;
  keywords: string[];
  startedAt: string;
  completedAt: string;
  recordsFound: number;
  recordsNew: number;
  requestsMade: number;
  status: SessionStatus;
  errorMessage?: string;
}

export interface ScrapeLogRecord {
  id?: number;
  borough: string;
  keywords: string[];
  started_at: string;
  scraped_at: string;
  records_found: number;
  records_new: number;
  requests_made: number;
  status: SessionStatus;
  error_message: string | null;
}

export type ScrapeState = 'initialized' | 'running' | 'completed' | 'error';

/**
 * Live, in-memory progress of one borough; never persisted
 */
export interface ScrapeStatus {
  borough: string;
  state: ScrapeState;
  currentKeyword: string | null;
  keywordIndex: number;
  keywordTotal: number;
  requestsMade: number;
  pagesProcessed: number;
  applicationsFound: number;
  lastError: string | null;
  lastRun: string | null;
  updatedAt: string;
}

export interface BoroughScrapeResult {
  borough: string;
  success: boolean;
  totalFound: number;
  newApplications: number;
  requestsMade: number;
  duration: number;
  applications: PlanningApplication[];
  error?: string;
}

export interface InsertCounts {
  total: number;
  new: number;
}

export interface ApplicationQuery {
  borough?: string;
  keyword?: string;
  dateFrom?: string;
  dateTo?: string;
}

export interface StoreStatistics {
  totalApplications: number;
  byBorough: Record<string, number>;
  byKeyword: Record<string, number>;
  lastScrapes: Record<string, string>;
}

/**
 * Persistence collaborator for scraped applications and session logs
 */
export interface ApplicationStore {
  insertOrIgnore(application: PlanningApplication): Promise<boolean>;
  bulkInsert(applications: PlanningApplication[]): Promise<InsertCounts>;
  logSession(session: ScrapeSession): Promise<void>;
  query(filters?: ApplicationQuery): Promise<PlanningApplication[]>;
  statistics(): Promise<StoreStatistics>;
  testConnection(): Promise<boolean>;
}
