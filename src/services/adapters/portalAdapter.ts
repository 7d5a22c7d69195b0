import * as cheerio from 'cheerio';
import { BoroughConfig, ListingCandidate, ListingResult, PortalFamily } from '../../types/planning';
import { cleanText, isValidProjectId, isValidUrl } from '../textUtils';

export type CheerioAPI = ReturnType<typeof cheerio.load>;

export interface SearchRequest {
  url: string;
  method: 'GET' | 'POST';
  fields: Record<string, string>;
  /** Page to load first for cookies and a CSRF token */
  primeUrl?: string;
}

/**
 * Knows one family of portal HTML: how to ask for a search and how to read the answer
 */
export interface PortalAdapter {
  readonly family: PortalFamily;
  buildSearchRequest(keyword: string): SearchRequest;
  parseListing(html: string): ListingResult;
  extractDetailText(html: string): string;
}

const TOO_MANY_RESULTS_MESSAGES = ['too many results'];
const NO_RESULTS_MESSAGES = ['no results', 'no applications found'];
const DETAIL_CONTENT_SELECTORS = ['div.content', '#main', 'div.main-content', 'main', 'body'];

export abstract class BasePortalAdapter implements PortalAdapter {
  abstract readonly family: PortalFamily;

  constructor(protected readonly config: BoroughConfig) {}

  abstract buildSearchRequest(keyword: string): SearchRequest;

  /**
   * Candidates found in the listing, or null when the listing container is absent
   */
  protected abstract parseCandidates($: CheerioAPI): ListingCandidate[] | null;

  parseListing(html: string): ListingResult {
    const lower = html.toLowerCase();
    if (TOO_MANY_RESULTS_MESSAGES.some(message => lower.includes(message))) {
      return { outcome: 'too_many_results', candidates: [] };
    }
    if (NO_RESULTS_MESSAGES.some(message => lower.includes(message))) {
      return { outcome: 'no_results', candidates: [] };
    }

    let parsed: ListingCandidate[] | null;
    try {
      parsed = this.parseCandidates(cheerio.load(html));
    } catch (error) {
      console.error(`[${this.config.name}] Error parsing listing:`, error instanceof Error ? error.message : error);
      return { outcome: 'missing_structure', candidates: [] };
    }

    if (parsed === null) {
      return { outcome: 'missing_structure', candidates: [] };
    }

    const seen = new Set<string>();
    const candidates = parsed.filter(candidate => {
      if (!isValidProjectId(candidate.candidateId) || !isValidUrl(candidate.detailUrl) || seen.has(candidate.candidateId)) {
        return false;
      }
      seen.add(candidate.candidateId);
      return true;
    });

    return candidates.length > 0
      ? { outcome: 'results', candidates }
      : { outcome: 'no_results', candidates: [] };
  }

  /**
   * Visible text of the detail page's main content area
   */
  extractDetailText(html: string): string {
    const $ = cheerio.load(html);
    $('script, style, noscript').remove();

    for (const selector of DETAIL_CONTENT_SELECTORS) {
      const area = $(selector).first();
      if (area.length > 0) {
        // Keep adjacent elements from running together
        area.find('*').each((_, element) => {
          $(element).append(' ');
        });
        return cleanText(area.text());
      }
    }

    return '';
  }
}
