import { ScrapingSettings } from '../config/settings';
import { BoroughConfig, ListingResult } from '../types/planning';
import { createPortalAdapter, PortalAdapter } from './adapters';
import { PortalClient } from './portalClient';

export interface SearchOutcome extends ListingResult {
  sourceUrl: string;
}

/**
 * What a borough scraper needs from a portal, whatever its HTML family
 */
export interface PortalSearcher {
  readonly borough: string;
  readonly requestsMade: number;
  search(keyword: string): Promise<SearchOutcome>;
  fetchDetail(url: string): Promise<string>;
  shutdown(): Promise<void>;
}

export type PortalClientLike = Pick<PortalClient, 'get' | 'post' | 'prime' | 'requestsMade'>;

/**
 * Portal searcher over plain HTTP: adapter for the HTML, client for the transport
 */
export class HttpPortalSearcher implements PortalSearcher {
  constructor(
    private readonly config: BoroughConfig,
    private readonly adapter: PortalAdapter,
    private readonly client: PortalClientLike
  ) {}

  get borough(): string {
    return this.config.name;
  }

  get requestsMade(): number {
    return this.client.requestsMade;
  }

  async search(keyword: string): Promise<SearchOutcome> {
    const request = this.adapter.buildSearchRequest(keyword);
    const fields = { ...request.fields };
    const unavailable: SearchOutcome = { outcome: 'unavailable', candidates: [], sourceUrl: request.url };

    if (request.primeUrl) {
      const primed = await this.client.prime(request.primeUrl);
      if (!primed) {
        console.warn(`[${this.config.name}] Could not load search page ${request.primeUrl}`);
        return unavailable;
      }
      if (primed.csrfToken) {
        fields._csrf = primed.csrfToken;
      }
    }

    const response = request.method === 'POST'
      ? await this.client.post(request.url, fields, { referer: request.primeUrl ?? request.url })
      : await this.client.get(request.url);

    if (!response) {
      return unavailable;
    }

    return { ...this.adapter.parseListing(response.html), sourceUrl: request.url };
  }

  async fetchDetail(url: string): Promise<string> {
    const response = await this.client.get(url);
    return response ? this.adapter.extractDetailText(response.html) : '';
  }

  async shutdown(): Promise<void> {
    // Nothing is held open between requests
  }
}

export function createPortalSearcher(config: BoroughConfig, settings: ScrapingSettings): PortalSearcher {
  const client = new PortalClient({ settings, label: config.name });
  return new HttpPortalSearcher(config, createPortalAdapter(config), client);
}
