/**
 * Tunables for the scraping pipeline, read from the environment
 */
export interface ScrapingSettings {
  requestDelayMs: number;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  userAgent: string;
  keywordDelayMs: number;
  maxCandidatesPerBorough: number;
  maxParallelBoroughs: number;
  respectRobotsTxt: boolean;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_SCRAPING_SETTINGS: ScrapingSettings = {
  requestDelayMs: 2000,
  timeoutMs: 30000,
  maxRetries: 3,
  retryBaseDelayMs: 1000,
  retryMaxDelayMs: 30000,
  userAgent: DEFAULT_USER_AGENT,
  keywordDelayMs: 1000,
  maxCandidatesPerBorough: 50,
  maxParallelBoroughs: 3,
  respectRobotsTxt: true
};

function readInteger(value: string | undefined, fallback: number, minimum: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < minimum) {
    console.warn(`Ignoring invalid numeric setting "${value}", using ${fallback}`);
    return fallback;
  }

  return parsed;
}

function readBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

export function loadScrapingSettings(env: NodeJS.ProcessEnv = process.env): ScrapingSettings {
  const defaults = DEFAULT_SCRAPING_SETTINGS;

  return {
    requestDelayMs: readInteger(env.REQUEST_DELAY_MS, defaults.requestDelayMs, 0),
    timeoutMs: readInteger(env.REQUEST_TIMEOUT_MS, defaults.timeoutMs, 1),
    maxRetries: readInteger(env.MAX_RETRIES, defaults.maxRetries, 1),
    retryBaseDelayMs: readInteger(env.RETRY_BASE_DELAY_MS, defaults.retryBaseDelayMs, 0),
    retryMaxDelayMs: readInteger(env.RETRY_MAX_DELAY_MS, defaults.retryMaxDelayMs, 0),
    userAgent: env.SCRAPER_USER_AGENT || defaults.userAgent,
    keywordDelayMs: readInteger(env.KEYWORD_DELAY_MS, defaults.keywordDelayMs, 0),
    maxCandidatesPerBorough: readInteger(env.MAX_CANDIDATES_PER_BOROUGH, defaults.maxCandidatesPerBorough, 1),
    maxParallelBoroughs: readInteger(env.MAX_PARALLEL_BOROUGHS, defaults.maxParallelBoroughs, 1),
    respectRobotsTxt: readBoolean(env.RESPECT_ROBOTS_TXT, defaults.respectRobotsTxt)
  };
}

/**
 * Process-wide settings: connections, schedule and scraping tunables
 */
export interface AppSettings {
  supabaseUrl?: string;
  supabaseServiceRoleKey?: string;
  redisUrl: string;
  scrapeCron: string;
  scrapeTimezone: string;
  scraping: ScrapingSettings;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  return {
    supabaseUrl: env.SUPABASE_URL || undefined,
    supabaseServiceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY || undefined,
    redisUrl: env.REDIS_URL || 'redis://localhost:6379',
    scrapeCron: env.SCRAPE_CRON || '0 */6 * * *',
    scrapeTimezone: env.SCRAPE_TIMEZONE || 'Europe/London',
    scraping: loadScrapingSettings(env)
  };
}
