import { ListingCandidate } from '../../types/planning';
import { cleanText, parseSubmissionDate, resolveUrl } from '../textUtils';
import { BasePortalAdapter, CheerioAPI, SearchRequest } from './portalAdapter';

const REFERENCE_PATTERN = /Ref\. No:\s*([^|]+)/;
const RECEIVED_PATTERN = /Received:\s*([^|]+)/;

function keyValFrom(url: string): string {
  try {
    return new URL(url).searchParams.get('keyVal') ?? '';
  } catch {
    return '';
  }
}

/**
 * Simple-search portals that answer with a list of result cards.
 * The search page must be loaded first to obtain the session's _csrf token.
 */
export class ResultCardAdapter extends BasePortalAdapter {
  readonly family = 'result_card' as const;

  buildSearchRequest(keyword: string): SearchRequest {
    return {
      url: `${this.config.baseUrl}/online-applications/simpleSearchResults.do?action=firstPage`,
      method: 'POST',
      fields: {
        'searchCriteria.simpleSearchString': keyword,
        'searchCriteria.simpleSearch': 'true'
      },
      primeUrl: this.config.searchUrl
    };
  }

  protected parseCandidates($: CheerioAPI): ListingCandidate[] | null {
    const list = $('ul#searchresults').first();
    if (list.length === 0) {
      return null;
    }

    const candidates: ListingCandidate[] = [];
    for (const item of list.find('li.searchresult').toArray()) {
      const card = $(item);
      const link = card.find('a.summaryLink').first();
      const detailUrl = resolveUrl(link.attr('href'), this.config.baseUrl);
      if (link.length === 0 || !detailUrl) {
        continue;
      }

      const description = link.find('div').first();
      const metaText = card.find('p.metaInfo').first().text();
      const reference = metaText.match(REFERENCE_PATTERN);
      const received = metaText.match(RECEIVED_PATTERN);

      candidates.push({
        candidateId: reference ? cleanText(reference[1]) : keyValFrom(detailUrl),
        detailUrl,
        titleHint: cleanText(description.length > 0 ? description.text() : link.text()),
        addressHint: cleanText(card.find('p.address').first().text()),
        submittedHint: received ? parseSubmissionDate(received[1]) : null
      });
    }

    return candidates;
  }
}
