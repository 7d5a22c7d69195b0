export const SCRAPE_QUEUE = 'planning-scraping';
export const SCRAPE_JOB = 'scrape-boroughs';

/**
 * Payload of a scrape job; omitted fields mean every configured borough or keyword
 */
export interface ScrapeJobData {
  boroughs?: string[];
  keywords?: string[];
}

export interface BoroughJobSummary {
  borough: string;
  success: boolean;
  totalFound: number;
  newApplications: number;
  error?: string;
}

export interface ScrapeJobResult {
  boroughs: BoroughJobSummary[];
  totalFound: number;
  newApplications: number;
}

export interface QueueStats {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

export interface RecentJob {
  id: string;
  name: string;
  status: 'completed' | 'failed' | 'active';
  timestamp: Date;
  progress?: number;
  error?: string;
}
