import { createPortalAdapter, ResultCardAdapter, TabularAdapter } from '../../../src/services/adapters';
import { BoroughConfig } from '../../../src/types/planning';
import { loadFixture } from '../../helpers/fixtures';

const westminster: BoroughConfig = {
  name: 'Westminster',
  baseUrl: 'https://idoxpa.westminster.gov.uk',
  searchUrl: 'https://idoxpa.westminster.gov.uk/online-applications/search.do?action=simple&searchType=Application',
  portalFamily: 'result_card'
};

describe('ResultCardAdapter', () => {
  const adapter = new ResultCardAdapter(westminster);

  describe('buildSearchRequest', () => {
    it('should prime the search page and POST a simple search', () => {
      expect(adapter.buildSearchRequest('vibration monitoring')).toEqual({
        url: 'https://idoxpa.westminster.gov.uk/online-applications/simpleSearchResults.do?action=firstPage',
        method: 'POST',
        fields: {
          'searchCriteria.simpleSearchString': 'vibration monitoring',
          'searchCriteria.simpleSearch': 'true'
        },
        primeUrl: westminster.searchUrl
      });
    });
  });

  describe('parseListing', () => {
    it('should read reference, address and received date from each card', () => {
      const result = adapter.parseListing(loadFixture('result-card-listing.html'));

      expect(result.outcome).toBe('results');
      expect(result.candidates[0]).toEqual({
        candidateId: '25/03344/LBC',
        detailUrl: 'https://idoxpa.westminster.gov.uk/online-applications/applicationDetails.do?activeTab=summary&keyVal=S1A2B3',
        titleHint: 'Listed building consent for structural monitoring survey equipment',
        addressHint: 'Palace Of Westminster, London, SW1A 0AA',
        submittedHint: '2025-05-16'
      });
    });

    it('should fall back to the keyVal when a card has no reference', () => {
      const result = adapter.parseListing(loadFixture('result-card-listing.html'));

      expect(result.candidates[1].candidateId).toBe('S9Z8Y7');
      expect(result.candidates[1].submittedHint).toBe('2025-05-20');
    });

    it('should skip cards without a summary link', () => {
      const html = `<ul id="searchresults">
        <li class="searchresult"><p class="metaInfo">Ref. No: 25/00001/FULL</p></li>
      </ul>`;

      expect(adapter.parseListing(html)).toEqual({ outcome: 'no_results', candidates: [] });
    });

    it('should reject references without a four character run', () => {
      const html = `<ul id="searchresults">
        <li class="searchresult">
          <a class="summaryLink" href="/details?keyVal=1"><div>Proposal</div></a>
          <p class="metaInfo">Ref. No: OK</p>
        </li>
      </ul>`;

      expect(adapter.parseListing(html).outcome).toBe('no_results');
    });

    it('should report a missing results list', () => {
      expect(adapter.parseListing('<html><body></body></html>').outcome).toBe('missing_structure');
    });

    it('should recognise the too many results message before parsing', () => {
      const html = '<ul id="searchresults"></ul><p>Too many results found</p>';

      expect(adapter.parseListing(html).outcome).toBe('too_many_results');
    });
  });
});

describe('createPortalAdapter', () => {
  it('should pick the adapter for the portal family', () => {
    expect(createPortalAdapter(westminster)).toBeInstanceOf(ResultCardAdapter);
    expect(createPortalAdapter({ ...westminster, portalFamily: 'tabular' })).toBeInstanceOf(TabularAdapter);
  });
});
