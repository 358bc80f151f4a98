/**
 * GitHub Client Tests
 *
 * Pagination, request headers and failure reporting for the issues and
 * comments endpoints.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  buildIssuesUrl,
  buildLastCommentUrl,
  classifyRateLimitError,
  describeFetchFailure,
  fetchIssuePage,
  fetchLastComment,
  getLastComment,
  hasNextPage,
  iterateIssues,
} from '../src/github';
import type { IssueQuery, RateLimitErrorDetails } from '../src/github';
import { FETCH_TIMEOUT_MS } from '../src/types';
import { mockResponse } from './helpers';

import issuesPage from './fixtures/issues_page.json';

const QUERY: IssueQuery = {
  repository: { owner: 'acme', repo: 'showcase' },
  state: 'open',
  label: 'design-submission',
};

const NEXT_LINK =
  '<https://api.github.com/repositories/1/issues?page=2>; rel="next", ' +
  '<https://api.github.com/repositories/1/issues?page=3>; rel="last"';

function makeDetails(overrides: Partial<RateLimitErrorDetails> = {}): RateLimitErrorDetails {
  return {
    status: 403,
    message: null,
    rate_limit_remaining: null,
    rate_limit_reset: null,
    retry_after_seconds: null,
    ...overrides,
  };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

// -----------------------------------------------------------------------------
// buildIssuesUrl / hasNextPage
// -----------------------------------------------------------------------------

describe('buildIssuesUrl', () => {
  it('includes state, label, page size and page number', () => {
    expect(buildIssuesUrl(QUERY, 2)).toBe(
      'https://api.github.com/repos/acme/showcase/issues?state=open&labels=design-submission&per_page=100&page=2',
    );
  });

  it('omits the label filter when label is null', () => {
    expect(buildIssuesUrl({ ...QUERY, label: null, state: 'all' }, 1)).toBe(
      'https://api.github.com/repos/acme/showcase/issues?state=all&per_page=100&page=1',
    );
  });
});

describe('hasNextPage', () => {
  it('detects rel="next"', () => {
    expect(hasNextPage(NEXT_LINK)).toBe(true);
  });

  it('returns false on the last page', () => {
    expect(
      hasNextPage(
        '<https://api.github.com/repositories/1/issues?page=1>; rel="first", ' +
          '<https://api.github.com/repositories/1/issues?page=2>; rel="prev"',
      ),
    ).toBe(false);
  });
});

// -----------------------------------------------------------------------------
// fetchIssuePage
// -----------------------------------------------------------------------------

describe('fetchIssuePage', () => {
  it('returns records and follows the Link header', async () => {
    const mockFetch = vi.fn().mockResolvedValue(mockResponse(200, issuesPage, { link: NEXT_LINK }));
    vi.stubGlobal('fetch', mockFetch);

    const result = await fetchIssuePage(QUERY, 1, null);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.issues).toHaveLength(3);
      expect(result.has_next).toBe(true);
    }
  });

  it('treats a short page without Link header as the last page', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(mockResponse(200, issuesPage)));

    const result = await fetchIssuePage(QUERY, 1, null);

    expect(result.success && result.has_next).toBe(false);
  });

  it('treats a full page without Link header as having a next page', async () => {
    const full = Array.from({ length: 100 }, (_, i) => ({ number: i + 1 }));
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(mockResponse(200, full)));

    const result = await fetchIssuePage(QUERY, 1, null);

    expect(result.success && result.has_next).toBe(true);
  });

  it('sends no Authorization header without a token', async () => {
    const mockFetch = vi.fn().mockResolvedValue(mockResponse(200, []));
    vi.stubGlobal('fetch', mockFetch);

    await fetchIssuePage(QUERY, 1, null);

    const headers = mockFetch.mock.calls[0]?.[1]?.headers as Record<string, string>;
    expect(headers['Authorization']).toBeUndefined();
    expect(headers['Accept']).toBe('application/vnd.github+json');
    expect(headers['X-GitHub-Api-Version']).toBe('2022-11-28');
  });

  it('sends a bearer token when provided', async () => {
    const mockFetch = vi.fn().mockResolvedValue(mockResponse(200, []));
    vi.stubGlobal('fetch', mockFetch);

    await fetchIssuePage(QUERY, 1, 'test-token');

    const headers = mockFetch.mock.calls[0]?.[1]?.headers as Record<string, string>;
    expect(headers['Authorization']).toBe('Bearer test-token');
  });

  it('returns an error for a non-array body', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(mockResponse(200, { message: 'odd' })));

    const result = await fetchIssuePage(QUERY, 1, null);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe('Failed to parse issues response: expected an array');
    }
  });

  it('captures rate limit headers and message for 403 responses', async () => {
    const response = mockResponse(
      403,
      { message: 'API rate limit exceeded for 203.0.113.7.' },
      { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1767225600' },
      'Forbidden',
    );
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(response));

    const result = await fetchIssuePage(QUERY, 1, null);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe('HTTP 403: Forbidden - API rate limit exceeded for 203.0.113.7.');
      expect(result.rate_limit).toEqual({
        status: 403,
        message: 'API rate limit exceeded for 203.0.113.7.',
        rate_limit_remaining: 0,
        rate_limit_reset: 1767225600,
        retry_after_seconds: null,
      });
    }
  });

  it('handles AbortError as a timeout', async () => {
    const abortError = new Error('The operation was aborted');
    abortError.name = 'AbortError';
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(abortError));

    const result = await fetchIssuePage(QUERY, 1, null);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe(
        `Request timeout: GitHub API did not respond within ${FETCH_TIMEOUT_MS}ms`,
      );
    }
  });

  it('handles network errors', async () => {
    const networkError = new Error('getaddrinfo ENOTFOUND api.github.com');
    networkError.name = 'TypeError';
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(networkError));

    const result = await fetchIssuePage(QUERY, 1, null);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe('Network error: getaddrinfo ENOTFOUND api.github.com');
    }
  });
});

// -----------------------------------------------------------------------------
// iterateIssues
// -----------------------------------------------------------------------------

describe('iterateIssues', () => {
  it('yields every record across pages in order', async () => {
    const mockFetch = vi
      .fn()
      .mockResolvedValueOnce(mockResponse(200, [{ number: 1 }, { number: 2 }], { link: NEXT_LINK }))
      .mockResolvedValueOnce(mockResponse(200, [{ number: 3 }]));
    vi.stubGlobal('fetch', mockFetch);

    const numbers: unknown[] = [];
    for await (const issue of iterateIssues(QUERY, 'test-token')) {
      numbers.push(issue);
    }

    expect(numbers).toEqual([{ number: 1 }, { number: 2 }, { number: 3 }]);
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(mockFetch.mock.calls[0]?.[0]).toContain('page=1');
    expect(mockFetch.mock.calls[1]?.[0]).toContain('page=2');
  });

  it('stops on an empty page even if a next link is present', async () => {
    const mockFetch = vi.fn().mockResolvedValue(mockResponse(200, [], { link: NEXT_LINK }));
    vi.stubGlobal('fetch', mockFetch);

    const records: unknown[] = [];
    for await (const issue of iterateIssues(QUERY, null)) {
      records.push(issue);
    }

    expect(records).toEqual([]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('re-fetches from page 1 on every call', async () => {
    const mockFetch = vi.fn().mockImplementation(() => Promise.resolve(mockResponse(200, [{ number: 9 }])));
    vi.stubGlobal('fetch', mockFetch);

    for await (const _ of iterateIssues(QUERY, null)) {
      // drain
    }
    for await (const _ of iterateIssues(QUERY, null)) {
      // drain
    }

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(mockFetch.mock.calls[1]?.[0]).toContain('page=1');
  });

  it('throws when a page fails', async () => {
    const response = mockResponse(
      403,
      { message: 'API rate limit exceeded' },
      { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1767225600' },
      'Forbidden',
    );
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(response));

    const drain = async (): Promise<void> => {
      for await (const _ of iterateIssues(QUERY, null)) {
        // drain
      }
    };

    await expect(drain()).rejects.toThrow(
      "Failed to fetch label 'design-submission' from acme/showcase (page 1): HTTP 403: Forbidden - API rate limit exceeded. Primary rate limit exhausted; resets at 2026-01-01T00:00:00.000Z. Set GITHUB_TOKEN to raise the limit",
    );
  });
});

// -----------------------------------------------------------------------------
// Rate limit reporting
// -----------------------------------------------------------------------------

describe('classifyRateLimitError', () => {
  it('returns null for non rate-limit statuses', () => {
    expect(classifyRateLimitError(makeDetails({ status: 404 }))).toBeNull();
  });

  it('classifies exhausted quota as primary', () => {
    expect(classifyRateLimitError(makeDetails({ rate_limit_remaining: 0 }))).toBe('primary');
  });

  it('classifies secondary limit messages', () => {
    expect(
      classifyRateLimitError(
        makeDetails({ status: 429, message: 'You have exceeded a secondary rate limit' }),
      ),
    ).toBe('secondary');
  });

  it('classifies retry-after without exhaustion as secondary', () => {
    expect(classifyRateLimitError(makeDetails({ retry_after_seconds: 30 }))).toBe('secondary');
  });

  it('returns unknown for a bare 403', () => {
    expect(classifyRateLimitError(makeDetails())).toBe('unknown');
  });
});

describe('describeFetchFailure', () => {
  it('omits the token hint when authenticated', () => {
    const message = describeFetchFailure(
      { ...QUERY, label: null },
      3,
      {
        success: false,
        error: 'HTTP 403: Forbidden',
        timestamp: '2026-01-01T00:00:00.000Z',
        rate_limit: makeDetails({ rate_limit_remaining: 0 }),
      },
      true,
    );

    expect(message).toBe(
      'Failed to fetch all issues from acme/showcase (page 3): HTTP 403: Forbidden. Primary rate limit exhausted',
    );
  });

  it('reports retry-after for secondary limits', () => {
    const message = describeFetchFailure(
      QUERY,
      1,
      {
        success: false,
        error: 'HTTP 429: Too Many Requests',
        timestamp: '2026-01-01T00:00:00.000Z',
        rate_limit: makeDetails({ status: 429, retry_after_seconds: 60 }),
      },
      false,
    );

    expect(message).toBe(
      "Failed to fetch label 'design-submission' from acme/showcase (page 1): HTTP 429: Too Many Requests. Secondary rate limit hit; retry after 60s",
    );
  });

  it('passes through plain failures', () => {
    const message = describeFetchFailure(
      QUERY,
      1,
      { success: false, error: 'Network error: boom', timestamp: '2026-01-01T00:00:00.000Z' },
      false,
    );

    expect(message).toBe(
      "Failed to fetch label 'design-submission' from acme/showcase (page 1): Network error: boom",
    );
  });
});

// -----------------------------------------------------------------------------
// Last comment
// -----------------------------------------------------------------------------

describe('buildLastCommentUrl', () => {
  it('addresses the last comment with a page size of one', () => {
    expect(buildLastCommentUrl(QUERY.repository, 7, 12)).toBe(
      'https://api.github.com/repos/acme/showcase/issues/7/comments?per_page=1&page=12',
    );
  });
});

describe('fetchLastComment', () => {
  it('returns the last record of the page', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(mockResponse(200, [{ id: 1 }, { id: 2 }])),
    );

    const result = await fetchLastComment(QUERY.repository, 7, 2, null);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.comment).toEqual({ id: 2 });
    }
  });

  it('returns null for an empty page', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(mockResponse(200, [])));

    const result = await fetchLastComment(QUERY.repository, 7, 1, null);

    expect(result.success && result.comment).toBeNull();
  });

  it('returns an error for a non-array body', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(mockResponse(200, { id: 1 })));

    const result = await fetchLastComment(QUERY.repository, 7, 1, null);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe('Failed to parse comments response: expected an array');
    }
  });
});

describe('getLastComment', () => {
  it('makes no request for an issue without comments', async () => {
    const mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);

    expect(await getLastComment(QUERY.repository, 7, 0, null)).toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('throws with the issue number and rate limit details', async () => {
    const response = mockResponse(
      403,
      { message: 'API rate limit exceeded' },
      { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1767225600' },
      'Forbidden',
    );
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(response));

    await expect(getLastComment(QUERY.repository, 7, 3, null)).rejects.toThrow(
      'Failed to fetch comments for issue #7 from acme/showcase: HTTP 403: Forbidden - API rate limit exceeded. Primary rate limit exhausted; resets at 2026-01-01T00:00:00.000Z. Set GITHUB_TOKEN to raise the limit',
    );
  });
});
