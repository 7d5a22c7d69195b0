import { createPortalAdapter } from '../../src/services/adapters';
import { BoroughScraper, BoroughScraperOptions } from '../../src/services/boroughScraper';
import { PortalResponse } from '../../src/services/portalClient';
import { HttpPortalSearcher, PortalClientLike, PortalSearcher } from '../../src/services/portalSearcher';
import { ScrapeStatusTracker } from '../../src/services/scrapeStatus';
import { BoroughConfig } from '../../src/types/planning';
import { candidate, FakeSearcher, results } from '../helpers/fakeSearcher';
import { loadFixture } from '../helpers/fixtures';
import { InMemoryStore } from '../helpers/inMemoryStore';

const westminster: BoroughConfig = {
  name: 'Westminster',
  baseUrl: 'https://idoxpa.westminster.gov.uk',
  searchUrl: 'https://idoxpa.westminster.gov.uk/online-applications/search.do?action=simple&searchType=Application',
  portalFamily: 'result_card'
};

const SUBMIT_URL = 'https://idoxpa.westminster.gov.uk/online-applications/simpleSearchResults.do?action=firstPage';
const NOW = new Date('2025-06-01T10:00:00.000Z');

describe('BoroughScraper', () => {
  let store: InMemoryStore;
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    store = new InMemoryStore();
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  function createScraper(searcher: PortalSearcher, overrides: Partial<BoroughScraperOptions> = {}): BoroughScraper {
    return new BoroughScraper({
      config: westminster,
      searcher,
      store,
      keywordDelayMs: 1000,
      maxCandidatesPerBorough: 50,
      sleep,
      now: () => NOW,
      ...overrides
    });
  }

  describe('end to end over portal HTML', () => {
    it('should yield one application for a single matching card', async () => {
      const listing = `<ul id="searchresults">
        <li class="searchresult">
          <a class="summaryLink" href="/online-applications/applicationDetails.do?activeTab=summary&amp;keyVal=S1A2B3">
            <div>Listed building consent</div>
          </a>
          <p class="address">Palace Of Westminster, London, SW1A 0AA</p>
          <p class="metaInfo">Ref. No: 25/03344/LBC | Received: Fri 16 May 2025</p>
        </li>
      </ul>`;
      const detailUrl = 'https://idoxpa.westminster.gov.uk/online-applications/applicationDetails.do?activeTab=summary&keyVal=S1A2B3';
      const client: PortalClientLike = {
        requestsMade: 0,
        prime: jest.fn().mockResolvedValue({ csrfToken: 'test-csrf-token', html: '' }),
        post: jest.fn(async (url: string): Promise<PortalResponse> => ({ url, status: 200, html: listing })),
        get: jest.fn(async (url: string): Promise<PortalResponse> => ({ url, status: 200, html: loadFixture('detail-page.html') }))
      };
      const searcher = new HttpPortalSearcher(westminster, createPortalAdapter(westminster), client);

      const result = await createScraper(searcher).scrape(['monitoring', 'noise monitoring']);

      expect(result.success).toBe(true);
      expect(result.applications).toEqual([
        {
          projectId: '25/03344/LBC',
          borough: 'Westminster',
          title: 'Listed building consent',
          address: 'Palace Of Westminster, London, SW1A 0AA',
          submissionDate: '2025-05-16',
          applicationUrl: detailUrl,
          detectedKeywords: ['monitoring'],
          sourceUrl: SUBMIT_URL,
          scrapedTimestamp: NOW.toISOString()
        }
      ]);
      expect(client.get).toHaveBeenCalledTimes(1);
      expect(result.newApplications).toBe(1);
    });
  });

  it('should keep only candidates whose text matches a keyword', async () => {
    const searcher = new FakeSearcher({
      borough: 'Westminster',
      listings: {
        'noise monitoring': results([
          candidate('24/00001/FULL'),
          candidate('24/00002/FULL', { titleHint: 'Noise Monitoring scheme' })
        ])
      },
      details: {
        [candidate('24/00001/FULL').detailUrl]: 'Rear extension'
      }
    });

    const result = await createScraper(searcher).scrape(['noise monitoring']);

    expect(result.applications.map(app => app.projectId)).toEqual(['24/00002/FULL']);
    expect(result.applications[0].detectedKeywords).toEqual(['noise monitoring']);
  });

  it('should detect every configured keyword, not just the one searched', async () => {
    const match = candidate('24/00003/FULL', { addressHint: 'Dust monitoring site' });
    const searcher = new FakeSearcher({
      borough: 'Westminster',
      listings: { 'noise monitoring': results([match]) },
      details: { [match.detailUrl]: 'Noise monitoring during piling' }
    });

    const result = await createScraper(searcher).scrape(['noise monitoring', 'dust monitoring']);

    expect(result.applications[0].detectedKeywords).toEqual(['noise monitoring', 'dust monitoring']);
  });

  it('should continue past a candidate whose detail fetch fails', async () => {
    const failing = candidate('24/00010/FULL');
    const passing = candidate('24/00011/FULL');
    const later = candidate('24/00012/FULL');
    const searcher = new FakeSearcher({
      borough: 'Westminster',
      listings: {
        'noise monitoring': results([failing, passing]),
        'dust monitoring': results([later])
      },
      details: {
        [failing.detailUrl]: new Error('socket hang up'),
        [passing.detailUrl]: 'Noise monitoring plan',
        [later.detailUrl]: 'Dust monitoring plan'
      }
    });

    const result = await createScraper(searcher).scrape(['noise monitoring', 'dust monitoring']);

    expect(result.success).toBe(true);
    expect(result.applications.map(app => app.projectId)).toEqual(['24/00011/FULL', '24/00012/FULL']);
  });

  it('should continue with the next keyword when a search throws', async () => {
    const later = candidate('24/00020/FULL');
    const searcher = new FakeSearcher({
      borough: 'Westminster',
      listings: {
        'noise monitoring': new Error('unexpected markup'),
        'dust monitoring': results([later])
      },
      details: { [later.detailUrl]: 'Dust monitoring plan' }
    });

    const result = await createScraper(searcher).scrape(['noise monitoring', 'dust monitoring']);

    expect(result.success).toBe(true);
    expect(result.totalFound).toBe(1);
  });

  it('should fetch each candidate once per run', async () => {
    const shared = candidate('24/00030/FULL');
    const searcher = new FakeSearcher({
      borough: 'Westminster',
      listings: {
        'noise monitoring': results([shared]),
        'vibration monitoring': results([shared])
      },
      details: { [shared.detailUrl]: 'Noise and vibration monitoring' }
    });

    const result = await createScraper(searcher).scrape(['noise monitoring', 'vibration monitoring']);

    expect(searcher.fetched).toEqual([shared.detailUrl]);
    expect(result.applications).toHaveLength(1);
    expect(result.requestsMade).toBe(3);
  });

  it('should pause between keyword searches', async () => {
    const searcher = new FakeSearcher({ borough: 'Westminster' });

    await createScraper(searcher).scrape(['a', 'b', 'c']);

    expect(searcher.searched).toEqual(['a', 'b', 'c']);
    expect(sleep.mock.calls).toEqual([[1000], [1000]]);
  });

  it('should cap detail fetches per run', async () => {
    const candidates = [candidate('24/00041/FULL'), candidate('24/00042/FULL'), candidate('24/00043/FULL')];
    const searcher = new FakeSearcher({
      borough: 'Westminster',
      listings: { 'noise monitoring': results(candidates) }
    });

    await createScraper(searcher, { maxCandidatesPerBorough: 2 }).scrape(['noise monitoring']);

    expect(searcher.fetched).toEqual([candidates[0].detailUrl, candidates[1].detailUrl]);
  });

  it('should skip the remaining keywords once the candidate cap is reached', async () => {
    const candidates = [candidate('24/00044/FULL'), candidate('24/00045/FULL'), candidate('24/00046/FULL')];
    const searcher = new FakeSearcher({
      borough: 'Westminster',
      listings: { a: results(candidates) }
    });

    const result = await createScraper(searcher, { maxCandidatesPerBorough: 2 }).scrape(['a', 'b', 'c']);

    expect(searcher.searched).toEqual(['a']);
    expect(searcher.fetched).toHaveLength(2);
    expect(sleep).not.toHaveBeenCalled();
    expect(result.success).toBe(true);
  });

  it('should store results and log exactly one successful session', async () => {
    const match = candidate('24/AP/0234');
    const searcher = new FakeSearcher({
      borough: 'Westminster',
      listings: { 'noise monitoring': results([match]) },
      details: { [match.detailUrl]: 'Noise monitoring' }
    });

    await createScraper(searcher).scrape(['noise monitoring']);

    expect(store.applications.size).toBe(1);
    expect(store.sessions).toEqual([
      {
        borough: 'Westminster',
        keywords: ['noise monitoring'],
        startedAt: NOW.toISOString(),
        completedAt: NOW.toISOString(),
        recordsFound: 1,
        recordsNew: 1,
        requestsMade: 2,
        status: 'success'
      }
    ]);
  });

  it('should report zero new applications when re-scraping', async () => {
    const match = candidate('24/AP/0234');
    const options = {
      borough: 'Westminster',
      listings: { 'noise monitoring': results([match]) },
      details: { [match.detailUrl]: 'Noise monitoring' }
    };

    const first = await createScraper(new FakeSearcher(options)).scrape(['noise monitoring']);
    const second = await createScraper(new FakeSearcher(options)).scrape(['noise monitoring']);

    expect(first.newApplications).toBe(1);
    expect(second.newApplications).toBe(0);
    expect(second.totalFound).toBe(1);
    expect(store.applications.size).toBe(1);
  });

  it('should turn a storage failure into a failed result with one error session', async () => {
    const match = candidate('24/00050/FULL');
    const searcher = new FakeSearcher({
      borough: 'Westminster',
      listings: { 'noise monitoring': results([match]) },
      details: { [match.detailUrl]: 'Noise monitoring' }
    });
    jest.spyOn(store, 'bulkInsert').mockRejectedValue(new Error('Failed to insert applications: timeout'));
    const scraper = createScraper(searcher);

    const result = await scraper.scrape(['noise monitoring']);

    expect(result.success).toBe(false);
    expect(result.error).toBe('Failed to insert applications: timeout');
    expect(result.applications).toEqual([]);
    expect(scraper.state).toBe('error');
    expect(store.sessions).toHaveLength(1);
    expect(store.sessions[0].status).toBe('error');
    expect(store.sessions[0].errorMessage).toBe('Failed to insert applications: timeout');
    expect(searcher.shutdownCalls).toBe(1);
  });

  it('should not log a second session when logging the first one fails', async () => {
    const searcher = new FakeSearcher({ borough: 'Westminster' });
    const logSession = jest.spyOn(store, 'logSession').mockRejectedValue(new Error('Failed to log scrape session: down'));

    const result = await createScraper(searcher).scrape(['noise monitoring']);

    expect(logSession).toHaveBeenCalledTimes(1);
    expect(result.success).toBe(false);
    expect(result.error).toBe('Failed to log scrape session: down');
  });

  it('should stop between keywords when cancelled', async () => {
    let cancelled = false;
    const searcher = new FakeSearcher({ borough: 'Westminster' });
    const searchSpy = jest.spyOn(searcher, 'search').mockImplementation(async () => {
      cancelled = true;
      return { outcome: 'no_results', candidates: [], sourceUrl: SUBMIT_URL };
    });

    const result = await createScraper(searcher, { cancellation: { isCancelled: () => cancelled } })
      .scrape(['noise monitoring', 'dust monitoring']);

    expect(searchSpy).toHaveBeenCalledTimes(1);
    expect(result.success).toBe(false);
    expect(result.error).toBe('Scraping stopped');
    expect(store.sessions[0].status).toBe('error');
  });

  it('should move from idle to completed and report progress', async () => {
    const tracker = new ScrapeStatusTracker(() => NOW);
    const searcher = new FakeSearcher({ borough: 'Westminster' });
    const scraper = createScraper(searcher, { reporter: tracker.reporter('Westminster') });

    expect(scraper.state).toBe('idle');
    await scraper.scrape(['noise monitoring', 'dust monitoring']);

    expect(scraper.state).toBe('completed');
    expect(tracker.get('Westminster')).toEqual(expect.objectContaining({
      state: 'completed',
      keywordIndex: 2,
      keywordTotal: 2,
      pagesProcessed: 2,
      requestsMade: 2,
      applicationsFound: 0,
      currentKeyword: null,
      lastError: null,
      lastRun: NOW.toISOString()
    }));
  });
});
