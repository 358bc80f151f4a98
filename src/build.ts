/**
 * Showcase Build
 * Layer: core
 *
 * Provided ports:
 *   - build.buildShowcase
 *
 * Runs the pipeline: fetch every contest's issues, parse them into
 * submissions, rank, render, write. Nothing is written until every fetch
 * has succeeded, so a failed run leaves the previous page in place.
 *
 * Required ports:
 *   - github.iterateIssues
 *   - github.fetchLastComment
 *   - parser.parseSubmission
 *   - parser.parseCommentSnippet
 *   - render.renderPage
 *   - output.writePage
 */

import * as core from '@actions/core';
import type {
  BuildReport,
  Config,
  ContestConfig,
  ContestReport,
  ContestSection,
  RepositoryRef,
  SkippedIssue,
  Submission,
} from './types';
import type { IssueQuery } from './github';
import { getLastComment, iterateIssues } from './github';
import { parseCommentSnippet, parseSubmission } from './parser';
import { renderPage, sortSubmissions } from './render';
import { writePage as writePageImpl } from './output';
import { isARealObject } from './utils';

/**
 * Dependency injection interface for buildShowcase.
 * Production defaults are used when not provided by tests.
 */
export interface BuildDeps {
  fetchIssues: (query: IssueQuery, token: string | null) => AsyncIterable<unknown>;
  /** Resolves to the latest raw comment, or null; rejects on API failure */
  fetchLastComment: (
    repository: RepositoryRef,
    issueNumber: number,
    commentCount: number,
    token: string | null,
  ) => Promise<unknown>;
  writePage: typeof writePageImpl;
}

const defaultDeps: BuildDeps = {
  fetchIssues: iterateIssues,
  fetchLastComment: getLastComment,
  writePage: writePageImpl,
};

// -----------------------------------------------------------------------------
// Port: build.buildShowcase
// -----------------------------------------------------------------------------

export async function buildShowcase(
  config: Config,
  deps: BuildDeps = defaultDeps,
): Promise<BuildReport> {
  const { settings, repository, token } = config;
  const repoName = `${repository.owner}/${repository.repo}`;

  if (!token) {
    core.info('No token configured; using the anonymous API rate limit.');
  }

  // One unlabelled fetch serves the title-prefix fallback of every contest
  let allIssues: unknown[] = [];
  if (settings.contests.some((contest) => contest.title_prefix !== null)) {
    core.info(`Fetching ${settings.issue_state} issues from ${repoName}...`);
    allIssues = await collect(
      deps.fetchIssues({ repository, state: settings.issue_state, label: null }, token),
    );
    core.info(`  Found ${allIssues.length} issues total.`);
  }

  const sections: ContestSection[] = [];
  const reports: ContestReport[] = [];

  for (const contest of settings.contests) {
    core.info(`Fetching issues for contest '${contest.name}' (label: ${contest.label})...`);
    const labelled = await collect(
      deps.fetchIssues({ repository, state: settings.issue_state, label: contest.label }, token),
    );
    core.info(`  Found ${labelled.length} labelled submissions.`);

    const candidates = mergeByTitlePrefix(labelled, allIssues, contest.title_prefix);
    if (candidates.length > labelled.length) {
      core.info(`  Picked up ${candidates.length - labelled.length} unlabelled by title prefix.`);
    }

    const parsed = parseCandidates(candidates, contest, config);
    const { skipped } = parsed;
    const submissions = settings.show_last_comment
      ? await attachLastComments(parsed.submissions, config, deps)
      : parsed.submissions;
    sections.push({ contest, submissions: sortSubmissions(submissions) });
    reports.push({
      contest_id: contest.id,
      contest_name: contest.name,
      rendered: submissions.length,
      skipped,
    });
  }

  const html = renderPage({ settings, repository, sections });
  const result = deps.writePage(html, config.output_path);
  if (!result.success) {
    throw new Error(result.error);
  }

  core.info(`Written ${result.bytes_written} bytes to ${config.output_path}`);

  return {
    contests: reports,
    output_path: config.output_path,
    bytes_written: result.bytes_written,
  };
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

async function collect(source: AsyncIterable<unknown>): Promise<unknown[]> {
  const records: unknown[] = [];
  for await (const record of source) {
    records.push(record);
  }
  return records;
}

function issueNumberOf(raw: unknown): number | null {
  return isARealObject(raw) && typeof raw['number'] === 'number' ? raw['number'] : null;
}

/**
 * Appends issues whose title starts with prefix to the labelled ones,
 * skipping any issue number already present.
 */
export function mergeByTitlePrefix(
  labelled: readonly unknown[],
  allIssues: readonly unknown[],
  prefix: string | null,
): unknown[] {
  const merged = [...labelled];
  if (!prefix) return merged;

  const seen = new Set<number>();
  for (const raw of labelled) {
    const number = issueNumberOf(raw);
    if (number !== null) seen.add(number);
  }

  for (const raw of allIssues) {
    const number = issueNumberOf(raw);
    if (number === null || seen.has(number)) continue;
    if (!isARealObject(raw) || typeof raw['title'] !== 'string') continue;
    if (!raw['title'].startsWith(prefix)) continue;
    merged.push(raw);
    seen.add(number);
  }
  return merged;
}

/**
 * Fetches the latest comment for every submission that has comments.
 * Requests run one at a time.
 */
async function attachLastComments(
  submissions: Submission[],
  config: Config,
  deps: BuildDeps,
): Promise<Submission[]> {
  const withComments: Submission[] = [];
  for (const submission of submissions) {
    if (submission.comment_count === 0) {
      withComments.push(submission);
      continue;
    }
    const raw = await deps.fetchLastComment(
      config.repository,
      submission.issue_number,
      submission.comment_count,
      config.token,
    );
    withComments.push({ ...submission, last_comment: parseCommentSnippet(raw) });
  }
  return withComments;
}

function parseCandidates(
  candidates: readonly unknown[],
  contest: ContestConfig,
  config: Config,
): { submissions: Submission[]; skipped: SkippedIssue[] } {
  const submissions: Submission[] = [];
  const skipped: SkippedIssue[] = [];

  for (const raw of candidates) {
    const outcome = parseSubmission(raw, {
      ranking: config.settings.ranking,
      winner_label: config.settings.winner_label,
      title_prefix: contest.title_prefix,
    });
    if (outcome.success) {
      core.debug(`  Parsed issue #${outcome.submission.issue_number}`);
      submissions.push(outcome.submission);
    } else {
      const issue = outcome.issue_number !== null ? `#${outcome.issue_number}` : 'record';
      core.warning(`Skipping issue ${issue} in '${contest.name}': ${outcome.reason}`);
      skipped.push(outcome);
    }
  }

  return { submissions, skipped };
}
