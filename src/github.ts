/**
 * GitHub API Client
 * Layer: infra
 *
 * Provided ports:
 *   - github.fetchIssuePage
 *   - github.iterateIssues
 *   - github.fetchLastComment
 *
 * Paginates the repository issues endpoint and reads the latest comment
 * of an issue.
 */

import type { IssueState, RepositoryRef } from './types';
import { FETCH_TIMEOUT_MS, GITHUB_API_BASE, ISSUES_PER_PAGE } from './types';
import { isARealObject } from './utils';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

const USER_AGENT = 'design-showcase-builder';

// -----------------------------------------------------------------------------
// Port: github.fetchIssuePage
// -----------------------------------------------------------------------------

export interface IssueQuery {
  repository: RepositoryRef;
  state: IssueState;
  /** Label filter; null fetches every issue in the given state */
  label: string | null;
}

export interface FetchIssuePageResult {
  success: true;
  /** Raw issue records, unvalidated */
  issues: unknown[];
  has_next: boolean;
  timestamp: string;
}

export interface RateLimitErrorDetails {
  status: number;
  message: string | null;
  rate_limit_remaining: number | null;
  rate_limit_reset: number | null;
  retry_after_seconds: number | null;
}

export interface GitHubRequestError {
  success: false;
  error: string;
  timestamp: string;
  rate_limit?: RateLimitErrorDetails;
}

export type FetchIssuePageOutcome = FetchIssuePageResult | GitHubRequestError;

/**
 * Builds the issues endpoint URL for one page.
 */
export function buildIssuesUrl(query: IssueQuery, page: number): string {
  const { owner, repo } = query.repository;
  const url = new URL(
    `${GITHUB_API_BASE}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/issues`,
  );
  url.searchParams.set('state', query.state);
  if (query.label !== null) {
    url.searchParams.set('labels', query.label);
  }
  url.searchParams.set('per_page', String(ISSUES_PER_PAGE));
  url.searchParams.set('page', String(page));
  return url.toString();
}

/**
 * Fetches one page of issues.
 *
 * @param token - GitHub token, or null for anonymous requests
 * @returns Page of raw records or error
 */
export async function fetchIssuePage(
  query: IssueQuery,
  page: number,
  token: string | null,
): Promise<FetchIssuePageOutcome> {
  const result = await requestJson(buildIssuesUrl(query, page), token);
  if (!result.success) return result;

  const { data, link, timestamp } = result;
  if (!Array.isArray(data)) {
    return {
      success: false,
      error: 'Failed to parse issues response: expected an array',
      timestamp,
    };
  }

  const has_next = link !== null ? hasNextPage(link) : data.length === ISSUES_PER_PAGE;

  return { success: true, issues: data, has_next, timestamp };
}

// -----------------------------------------------------------------------------
// Port: github.iterateIssues
// -----------------------------------------------------------------------------

/**
 * Lazily yields raw issue records page by page until the API reports no
 * further pages. Each call starts again from page 1.
 *
 * @throws Error on the first failed page; nothing is retried
 */
export async function* iterateIssues(
  query: IssueQuery,
  token: string | null,
): AsyncGenerator<unknown, void, undefined> {
  let page = 1;
  while (true) {
    const result = await fetchIssuePage(query, page, token);
    if (!result.success) {
      throw new Error(describeFetchFailure(query, page, result, token !== null));
    }
    yield* result.issues;
    if (!result.has_next || result.issues.length === 0) {
      return;
    }
    page += 1;
  }
}

// -----------------------------------------------------------------------------
// Port: github.fetchLastComment
// -----------------------------------------------------------------------------

export interface FetchLastCommentResult {
  success: true;
  /** Raw comment record, or null when the issue has none */
  comment: unknown;
  timestamp: string;
}

export type FetchLastCommentOutcome = FetchLastCommentResult | GitHubRequestError;

/**
 * Builds the comments URL that returns only the comment at position
 * commentCount, i.e. the latest one (comments are listed oldest first).
 */
export function buildLastCommentUrl(
  repository: RepositoryRef,
  issueNumber: number,
  commentCount: number,
): string {
  const { owner, repo } = repository;
  const url = new URL(
    `${GITHUB_API_BASE}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/issues/${issueNumber}/comments`,
  );
  url.searchParams.set('per_page', '1');
  url.searchParams.set('page', String(Math.max(commentCount, 1)));
  return url.toString();
}

/**
 * Fetches the latest comment on an issue.
 *
 * @param commentCount - the issue's `comments` value, used to address the last page
 */
export async function fetchLastComment(
  repository: RepositoryRef,
  issueNumber: number,
  commentCount: number,
  token: string | null,
): Promise<FetchLastCommentOutcome> {
  const result = await requestJson(
    buildLastCommentUrl(repository, issueNumber, commentCount),
    token,
  );
  if (!result.success) return result;

  const { data, timestamp } = result;
  if (!Array.isArray(data)) {
    return {
      success: false,
      error: 'Failed to parse comments response: expected an array',
      timestamp,
    };
  }

  const comment: unknown = data[data.length - 1] ?? null;
  return { success: true, comment, timestamp };
}

/**
 * Resolves to the latest raw comment on an issue, or null when it has none.
 *
 * @throws Error naming the issue and the HTTP failure
 */
export async function getLastComment(
  repository: RepositoryRef,
  issueNumber: number,
  commentCount: number,
  token: string | null,
): Promise<unknown> {
  if (commentCount <= 0) return null;

  const result = await fetchLastComment(repository, issueNumber, commentCount, token);
  if (!result.success) {
    const { owner, repo } = repository;
    throw new Error(
      `Failed to fetch comments for issue #${issueNumber} from ${owner}/${repo}: ${result.error}` +
        describeRateLimit(result, token !== null),
    );
  }
  return result.comment;
}

// -----------------------------------------------------------------------------
// Rate limit classification
// -----------------------------------------------------------------------------

export type RateLimitErrorKind = 'primary' | 'secondary' | 'unknown';

/**
 * Classifies a 403/429 response. Returns null for other statuses.
 *
 * https://docs.github.com/en/rest/using-the-rest-api/rate-limits-for-the-rest-api?apiVersion=2022-11-28#exceeding-the-rate-limit
 */
export function classifyRateLimitError(details: RateLimitErrorDetails): RateLimitErrorKind | null {
  if (details.status !== 403 && details.status !== 429) {
    return null;
  }

  const message = (details.message ?? '').toLowerCase();
  if (message.includes('secondary') || message.includes('abuse')) {
    return 'secondary';
  }

  if (details.rate_limit_remaining === 0) {
    return 'primary';
  }

  if (details.retry_after_seconds !== null) {
    return 'secondary';
  }

  return 'unknown';
}

/**
 * Builds the message for a failed page fetch.
 */
export function describeFetchFailure(
  query: IssueQuery,
  page: number,
  failure: GitHubRequestError,
  authenticated: boolean,
): string {
  const { owner, repo } = query.repository;
  const target = query.label !== null ? `label '${query.label}'` : 'all issues';
  return (
    `Failed to fetch ${target} from ${owner}/${repo} (page ${page}): ${failure.error}` +
    describeRateLimit(failure, authenticated)
  );
}

/**
 * Returns the rate-limit suffix for a failure message, or '' when the
 * failure is not a rate limit.
 */
function describeRateLimit(failure: GitHubRequestError, authenticated: boolean): string {
  const details = failure.rate_limit;
  if (!details) return '';

  let message = '';
  const kind = classifyRateLimitError(details);
  if (kind === 'primary') {
    message += '. Primary rate limit exhausted';
    if (details.rate_limit_reset !== null) {
      message += `; resets at ${new Date(details.rate_limit_reset * 1000).toISOString()}`;
    }
    if (!authenticated) {
      message += '. Set GITHUB_TOKEN to raise the limit';
    }
  } else if (kind === 'secondary') {
    message += '. Secondary rate limit hit';
    if (details.retry_after_seconds !== null) {
      message += `; retry after ${details.retry_after_seconds}s`;
    }
  }
  return message;
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

interface JsonResponse {
  success: true;
  data: unknown;
  /** Raw Link header, null when absent */
  link: string | null;
  timestamp: string;
}

/**
 * Performs one authenticated-if-possible GET with a timeout.
 * Never throws; HTTP, timeout and network failures become error results.
 */
async function requestJson(
  url: string,
  token: string | null,
): Promise<JsonResponse | GitHubRequestError> {
  const timestamp = new Date().toISOString();

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);

  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'User-Agent': USER_AGENT,
    'X-GitHub-Api-Version': '2022-11-28',
  };
  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      method: 'GET',
      headers,
    });

    clearTimeout(timeoutId);

    if (!response.ok) {
      const message = await readErrorMessage(response);
      const statusText = response.statusText || 'Unknown error';
      const error = message
        ? `HTTP ${response.status}: ${statusText} - ${message}`
        : `HTTP ${response.status}: ${statusText}`;
      return {
        success: false,
        error,
        timestamp,
        rate_limit: buildRateLimitErrorDetails(response, message),
      };
    }

    const data: unknown = await response.json();
    return { success: true, data, link: response.headers.get('link'), timestamp };
  } catch (err) {
    clearTimeout(timeoutId);

    const error = err as Error;

    if (error.name === 'AbortError') {
      return {
        success: false,
        error: `Request timeout: GitHub API did not respond within ${FETCH_TIMEOUT_MS}ms`,
        timestamp,
      };
    }

    return {
      success: false,
      error: `Network error: ${error.message}`,
      timestamp,
    };
  }
}

/**
 * Returns true if an RFC 8288 Link header carries rel="next".
 */
export function hasNextPage(linkHeader: string): boolean {
  return linkHeader
    .split(',')
    .some((part) => /;\s*rel="next"/.test(part));
}

function parseHeaderNumber(headers: Headers, name: string): number | null {
  const value = headers.get(name);
  if (!value) return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

async function readErrorMessage(response: Response): Promise<string | null> {
  try {
    const text = (await response.text()).trim();
    if (!text) return null;
    try {
      const parsed: unknown = JSON.parse(text);
      if (isARealObject(parsed) && typeof parsed['message'] === 'string') {
        return parsed['message'];
      }
    } catch {
      // Not JSON; use the raw text
    }
    return text;
  } catch {
    return null;
  }
}

function buildRateLimitErrorDetails(
  response: Response,
  message: string | null,
): RateLimitErrorDetails {
  return {
    status: response.status,
    message,
    rate_limit_remaining: parseHeaderNumber(response.headers, 'x-ratelimit-remaining'),
    rate_limit_reset: parseHeaderNumber(response.headers, 'x-ratelimit-reset'),
    retry_after_seconds: parseHeaderNumber(response.headers, 'retry-after'),
  };
}
