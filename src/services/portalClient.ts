import * as cheerio from 'cheerio';
import { AxiosResponse } from 'axios';
import { ScrapingSettings } from '../config/settings';
import { Sleep, sleep as defaultSleep } from '../utils/delay';
import { createHttpTransport, HttpTransport } from './httpTransport';
import { RetryableError, RetryPolicy } from './retryPolicy';
import { RobotsPolicy } from './robotsPolicy';

export interface PortalResponse {
  url: string;
  status: number;
  html: string;
}

export interface PrimedSession {
  csrfToken: string | null;
  html: string;
}

export interface PostOptions {
  referer?: string;
}

export type PortalClientSettings = Pick<
  ScrapingSettings,
  'requestDelayMs' | 'timeoutMs' | 'maxRetries' | 'retryBaseDelayMs' | 'retryMaxDelayMs' | 'userAgent' | 'respectRobotsTxt'
>;

export interface PortalClientOptions {
  settings: PortalClientSettings;
  transport?: HttpTransport;
  robots?: Pick<RobotsPolicy, 'isAllowed'>;
  sleep?: Sleep;
  now?: () => number;
  label?: string;
}

/**
 * Access refused by the portal (403 or an anti-bot challenge page); never retried
 */
export class BlockedError extends Error {
  constructor(message: string, readonly status: number) {
    super(message);
    this.name = 'BlockedError';
  }
}

const CHALLENGE_MARKERS = [
  'cf-browser-verification',
  'challenge-platform',
  '<title>just a moment',
  '<title>access denied'
];

export function isChallengePage(html: string): boolean {
  const lower = html.toLowerCase();
  return CHALLENGE_MARKERS.some(marker => lower.includes(marker));
}

/**
 * CSRF token from a hidden _csrf input or meta tag
 */
export function extractCsrfToken(html: string): string | null {
  const $ = cheerio.load(html);
  const fromInput = $('input[name="_csrf"]').first().attr('value');
  if (fromInput) {
    return fromInput;
  }
  const fromMeta = $('meta[name="_csrf"]').first().attr('content');
  return fromMeta || null;
}

function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return undefined;
  }
  const seconds = Number(value);
  return isNaN(seconds) ? undefined : Math.max(0, seconds * 1000);
}

/**
 * Session-scoped HTTP client for one portal: rate limited per host,
 * retried with backoff, cookies replayed across requests
 */
export class PortalClient {
  private readonly settings: PortalClientSettings;
  private readonly transport: HttpTransport;
  private readonly robots: Pick<RobotsPolicy, 'isAllowed'>;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly label: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly lastRequestAt: Map<string, number> = new Map();
  private readonly cookies: Map<string, string> = new Map();
  private requestCount = 0;

  constructor(options: PortalClientOptions) {
    this.settings = options.settings;
    this.transport = options.transport ?? createHttpTransport(options.settings.timeoutMs);
    this.robots = options.robots ?? new RobotsPolicy(this.transport, options.settings.userAgent);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.label = options.label ?? 'PortalClient';
    this.retryPolicy = new RetryPolicy({
      maxAttempts: options.settings.maxRetries,
      baseDelayMs: options.settings.retryBaseDelayMs,
      maxDelayMs: options.settings.retryMaxDelayMs,
      sleep: this.sleep,
      onRetry: (error, attempt, delayMs) => {
        const message = error instanceof Error ? error.message : String(error);
        console.log(`[${this.label}] Attempt ${attempt} failed (${message}), retrying in ${delayMs}ms`);
      }
    });
  }

  get requestsMade(): number {
    return this.requestCount;
  }

  async get(url: string): Promise<PortalResponse | null> {
    return this.send('GET', url);
  }

  async post(url: string, fields: Record<string, string>, options: PostOptions = {}): Promise<PortalResponse | null> {
    return this.send('POST', url, new URLSearchParams(fields).toString(), {
      'Content-Type': 'application/x-www-form-urlencoded',
      Referer: options.referer ?? url
    });
  }

  /**
   * Load a search page so its cookies and CSRF token are available to the following POST
   */
  async prime(url: string): Promise<PrimedSession | null> {
    const response = await this.get(url);
    if (!response) {
      return null;
    }
    return { csrfToken: extractCsrfToken(response.html), html: response.html };
  }

  extractCsrfToken(html: string): string | null {
    return extractCsrfToken(html);
  }

  private async send(
    method: 'GET' | 'POST',
    url: string,
    body?: string,
    extraHeaders: Record<string, string> = {}
  ): Promise<PortalResponse | null> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      console.error(`[${this.label}] Invalid URL: ${url}`);
      return null;
    }

    const headers = method === 'POST' ? { ...extraHeaders, Origin: parsed.origin } : extraHeaders;

    if (this.settings.respectRobotsTxt && !(await this.robots.isAllowed(url))) {
      console.warn(`[${this.label}] robots.txt disallows ${url}, skipping`);
      return null;
    }

    try {
      return await this.retryPolicy.execute(async () => {
        await this.waitForRateLimit(parsed.host);
        const response = await this.exchange(method, url, body, headers, parsed.host);
        return this.interpret(url, response);
      });
    } catch (error) {
      if (error instanceof BlockedError) {
        console.warn(`[${this.label}] ${error.message}`);
      } else {
        console.error(`[${this.label}] ${method} ${url} failed:`, error instanceof Error ? error.message : error);
      }
      return null;
    }
  }

  private async exchange(
    method: 'GET' | 'POST',
    url: string,
    body: string | undefined,
    extraHeaders: Record<string, string>,
    host: string
  ): Promise<AxiosResponse<unknown>> {
    this.requestCount++;
    try {
      return await this.transport.request<unknown>({
        url,
        method,
        data: body,
        timeout: this.settings.timeoutMs,
        responseType: 'text',
        maxRedirects: 5,
        validateStatus: () => true,
        headers: {
          'User-Agent': this.settings.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-GB,en;q=0.9',
          ...this.cookieHeader(),
          ...extraHeaders
        }
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RetryableError(`Network error: ${message}`);
    } finally {
      this.lastRequestAt.set(host, this.now());
    }
  }

  private interpret(url: string, response: AxiosResponse<unknown>): PortalResponse | null {
    this.storeCookies(response.headers['set-cookie']);

    const status = response.status;
    const html = typeof response.data === 'string' ? response.data : '';

    if (status === 429) {
      throw new RetryableError(`Rate limited (429) by ${url}`, parseRetryAfter(response.headers['retry-after']));
    }
    if (status >= 500) {
      throw new RetryableError(`Server error ${status} from ${url}`);
    }
    if (status === 403) {
      throw new BlockedError(`Blocked (403) by ${url}`, status);
    }
    if (isChallengePage(html)) {
      throw new BlockedError(`Anti-bot challenge returned by ${url}`, status);
    }
    if (status < 200 || status >= 300) {
      console.warn(`[${this.label}] Unexpected status ${status} from ${url}`);
      return null;
    }

    return { url, status, html };
  }

  private async waitForRateLimit(host: string): Promise<void> {
    const last = this.lastRequestAt.get(host);
    if (last === undefined) {
      return;
    }

    const waitTime = this.settings.requestDelayMs - (this.now() - last);
    if (waitTime > 0) {
      await this.sleep(waitTime);
    }
  }

  private storeCookies(setCookie: unknown): void {
    if (!Array.isArray(setCookie)) {
      return;
    }

    for (const header of setCookie) {
      if (typeof header !== 'string') {
        continue;
      }
      const pair = header.split(';')[0];
      const separator = pair.indexOf('=');
      if (separator > 0) {
        this.cookies.set(pair.substring(0, separator).trim(), pair.substring(separator + 1).trim());
      }
    }
  }

  private cookieHeader(): Record<string, string> {
    if (this.cookies.size === 0) {
      return {};
    }
    const cookie = Array.from(this.cookies.entries())
      .map(([name, value]) => `${name}=${value}`)
      .join('; ');
    return { Cookie: cookie };
  }
}
