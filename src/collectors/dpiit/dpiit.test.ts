/**
 * Tests for the Startup India (DPIIT) collector
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { DPIITCollector } from './collector.js';
import {
  extractSearchResults,
  formatLocation,
  mapSearchItem,
  parseDirectoryCards,
  resolveCardLink,
} from './parser.js';

const mockFetch = jest.fn<typeof fetch>();
const originalFetch = global.fetch;

function createMockResponse(body: unknown, options: { ok?: boolean; status?: number } = {}): Response {
  const { ok = true, status = 200 } = options;
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return {
    ok,
    status,
    json: async () => JSON.parse(text),
    text: async () => text,
    headers: new Headers(),
    statusText: ok ? 'OK' : 'Error',
  } as Response;
}

function createMockLogger() {
  return {
    debug: jest.fn<(message: string, ...args: unknown[]) => void>(),
    info: jest.fn<(message: string, ...args: unknown[]) => void>(),
    warn: jest.fn<(message: string, ...args: unknown[]) => void>(),
    error: jest.fn<(message: string, ...args: unknown[]) => void>(),
  };
}

const searchPage = {
  results: [
    {
      name: 'Razorpay',
      website: 'razorpay.com',
      city: 'Bengaluru',
      state: 'Karnataka',
      description: 'Payments platform for businesses',
      industry: 'Fintech',
      stage: 'Scaling',
    },
    { startupName: 'Krishi Labs', about: 'Farm analytics startup', city: 'Pune' },
    { city: 'Nowhere' },
    'junk',
  ],
};

const directoryHtml = `
  <html><body>
    <div class="startup-card">
      <h3>Agrowave</h3>
      <a href="/content/sih/en/profile/agrowave.html">View profile</a>
      <p>Agri supply chain startup</p>
    </div>
    <div class="startup-card">
      <h3>Zepto</h3>
      <a href="https://zeptonow.com">Website</a>
      <p class="description">Quick commerce startup</p>
    </div>
  </body></html>`;

// ============================================================================
// Parsers
// ============================================================================

describe('DPIIT parsers', () => {
  it('finds the hit list under any known key', () => {
    expect(extractSearchResults({ data: [1] })).toEqual([1]);
    expect(extractSearchResults({ results: [], searchResults: [2] })).toEqual([2]);
    expect(extractSearchResults('<html>')).toEqual([]);
    expect(extractSearchResults({ results: 'none' })).toEqual([]);
  });

  it('formats city and state with India as the default state', () => {
    expect(formatLocation({ city: 'Bengaluru', state: 'Karnataka' })).toBe('Bengaluru, Karnataka');
    expect(formatLocation({ city: 'Pune' })).toBe('Pune, India');
    expect(formatLocation({})).toBe('India');
  });

  it('maps a hit using the alternative field names', () => {
    expect(mapSearchItem(searchPage.results[1])).toEqual({
      name: 'Krishi Labs',
      source: 'dpiit_api',
      website: '',
      description: 'Farm analytics startup',
      location: 'Pune, India',
      industry: '',
      fundingStage: '',
      confidence: 'high',
    });
  });

  it('skips hits without a name and malformed hits', () => {
    expect(mapSearchItem({ city: 'Nowhere' })).toBeNull();
    expect(mapSearchItem('junk')).toBeNull();
  });

  it('resolves card links', () => {
    expect(resolveCardLink('https://zeptonow.com')).toBe('https://zeptonow.com');
    expect(resolveCardLink('/content/x.html')).toBe('https://www.startupindia.gov.in/content/x.html');
    expect(resolveCardLink('mailto:hello@example.com')).toBe('');
    expect(resolveCardLink(undefined)).toBe('');
  });

  it('parses directory cards', () => {
    const cards = parseDirectoryCards(directoryHtml);

    expect(cards).toEqual([
      {
        name: 'Agrowave',
        source: 'dpiit_html',
        website: 'https://www.startupindia.gov.in/content/sih/en/profile/agrowave.html',
        description: 'Agri supply chain startup',
        confidence: 'high',
      },
      {
        name: 'Zepto',
        source: 'dpiit_html',
        website: 'https://zeptonow.com',
        description: 'Quick commerce startup',
        confidence: 'high',
      },
    ]);
  });

  it('falls back to generic card selectors', () => {
    const cards = parseDirectoryCards('<div class="card"><h4>Licious</h4></div><div class="card"></div>');
    expect(cards.map((c) => c.name)).toEqual(['Licious']);
  });
});

// ============================================================================
// Collector
// ============================================================================

describe('DPIITCollector', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    global.fetch = mockFetch as unknown as typeof fetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('reads the search API and skips the directory when it fills the limit', async () => {
    mockFetch.mockResolvedValueOnce(createMockResponse(searchPage));

    const records = await new DPIITCollector().collect({ limit: 2 });

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(String(mockFetch.mock.calls[0][0])).toContain('page=0&results=20&sort=relevance');
    expect(records.map((r) => [r.name, r.source, r.location])).toEqual([
      ['Razorpay', 'dpiit_api', 'Bengaluru, Karnataka'],
      ['Krishi Labs', 'dpiit_api', 'Pune, India'],
    ]);
    expect(records[0].website).toBe('https://razorpay.com');
  });

  it('ends the API on a non-JSON body and tops up from the directory', async () => {
    mockFetch
      .mockResolvedValueOnce(createMockResponse('<html>Service unavailable</html>'))
      .mockResolvedValueOnce(createMockResponse(directoryHtml));
    const logger = createMockLogger();

    const records = await new DPIITCollector().collect({ limit: 2, logger });

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(String(mockFetch.mock.calls[1][0])).toBe(
      'https://www.startupindia.gov.in/content/sih/en/search.html?page=1'
    );
    expect(records.map((r) => [r.name, r.source])).toEqual([
      ['Agrowave', 'dpiit_html'],
      ['Zepto', 'dpiit_html'],
    ]);
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('[dpiit] Search API stopped: Expected JSON'));
  });

  it('does not duplicate a startup found by both the API and the directory', async () => {
    mockFetch
      .mockResolvedValueOnce(
        createMockResponse({
          results: [{ name: 'Zepto', website: 'https://zeptonow.com', description: 'Quick commerce startup' }],
        })
      )
      .mockResolvedValueOnce(createMockResponse(directoryHtml))
      .mockResolvedValueOnce(createMockResponse('<html></html>'));

    const records = await new DPIITCollector().collect({ limit: 5 });

    expect(records.map((r) => [r.name, r.source])).toEqual([
      ['Zepto', 'dpiit_api'],
      ['Agrowave', 'dpiit_html'],
    ]);
  });

  it('returns what it has when the directory fails', async () => {
    mockFetch
      .mockResolvedValueOnce(createMockResponse({ results: [] }))
      .mockResolvedValueOnce(createMockResponse('blocked', { ok: false, status: 403 }));
    const logger = createMockLogger();

    const records = await new DPIITCollector().collect({ logger });

    expect(records).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      '[dpiit] Directory fallback failed: HTTP 403 from https://www.startupindia.gov.in/content/sih/en/search.html?page=1: blocked'
    );
  });
});
