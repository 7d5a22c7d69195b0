import { ListingCandidate } from '../../types/planning';
import { cleanText, parseSubmissionDate, resolveUrl } from '../textUtils';
import { BasePortalAdapter, CheerioAPI, SearchRequest } from './portalAdapter';

/**
 * Advanced-search portals that answer with a results table:
 * reference link, address, proposal, ..., date received
 */
export class TabularAdapter extends BasePortalAdapter {
  readonly family = 'tabular' as const;

  buildSearchRequest(keyword: string): SearchRequest {
    return {
      url: this.config.searchUrl,
      method: 'POST',
      fields: {
        searchType: 'Application',
        'searchCriteria.applicationNumber': '',
        'searchCriteria.developmentAddress': '',
        'searchCriteria.proposal': keyword,
        'searchCriteria.postcode': '',
        'searchCriteria.receivedDateFrom': '',
        'searchCriteria.receivedDateTo': '',
        action: 'search'
      }
    };
  }

  protected parseCandidates($: CheerioAPI): ListingCandidate[] | null {
    const table = $('table.searchresults, table#searchresults').first();
    if (table.length === 0) {
      return null;
    }

    const candidates: ListingCandidate[] = [];
    // First row is the header
    for (const row of table.find('tr').toArray().slice(1)) {
      const cells = $(row).find('td');
      if (cells.length < 3) {
        continue;
      }

      const link = cells.eq(0).find('a').first();
      const detailUrl = resolveUrl(link.attr('href'), this.config.baseUrl);
      if (link.length === 0 || !detailUrl) {
        continue;
      }

      candidates.push({
        candidateId: cleanText(link.text()),
        detailUrl,
        addressHint: cleanText(cells.eq(1).text()),
        titleHint: cleanText(cells.eq(2).text()),
        submittedHint: cells.length > 3 ? parseSubmissionDate(cells.last().text()) : null
      });
    }

    return candidates;
  }
}
