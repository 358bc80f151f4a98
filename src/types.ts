/**
 * Boundary types for the design showcase builder
 *
 * These types define the contracts between modules.
 */

// -----------------------------------------------------------------------------
// Reactions
// -----------------------------------------------------------------------------

export const REACTION_CONTENTS = [
  '+1',
  '-1',
  'laugh',
  'hooray',
  'confused',
  'heart',
  'rocket',
  'eyes',
] as const;

export type ReactionContent = (typeof REACTION_CONTENTS)[number];

/** Count per reaction content; absent contents are 0 */
export type ReactionCounts = Record<ReactionContent, number>;

/** Ranking signal: the sum of all reactions, or one reaction content */
export type RankingKey = 'total' | ReactionContent;

// -----------------------------------------------------------------------------
// IssueRecord
// Raw API issue narrowed to the fields the builder reads
// -----------------------------------------------------------------------------

export interface IssueAuthor {
  login: string;
  html_url: string | null;
  avatar_url: string | null;
}

export interface IssueRecord {
  number: number;
  title: string;
  html_url: string;
  body: string | null;
  /** ISO timestamp */
  created_at: string;
  /** ISO timestamp */
  updated_at: string;
  /** Null for deleted ("ghost") accounts */
  user: IssueAuthor | null;
  /** Label names */
  labels: string[];
  reactions: ReactionCounts;
  /** Number of comments, as reported on the issue itself */
  comments: number;
  /** The issues endpoint also returns pull requests */
  is_pull_request: boolean;
}

// -----------------------------------------------------------------------------
// Submission
// One parsed, valid contest entry ready for rendering
// -----------------------------------------------------------------------------

export interface Submission {
  issue_number: number;
  /** Issue title without the contest title prefix */
  title: string;
  author_name: string;
  author_url: string | null;
  avatar_url: string | null;
  /** Preview image (http/https only) */
  image_url: string | null;
  /** Link to the design file or prototype (http/https only) */
  design_url: string | null;
  category: string;
  /** Plain text, not yet escaped */
  description: string;
  reactions: ReactionCounts;
  /** Ranking value derived from reactions */
  reaction_count: number;
  issue_url: string;
  created_at: string;
  updated_at: string;
  is_winner: boolean;
  comment_count: number;
  /** Filled in by the build when comment snippets are enabled */
  last_comment: CommentSnippet | null;
}

/**
 * Short plain-text preview of the latest comment on a submission.
 */
export interface CommentSnippet {
  author_login: string;
  author_url: string | null;
  avatar_url: string | null;
  /** Images and link targets removed, truncated, not yet escaped */
  body: string;
}

// -----------------------------------------------------------------------------
// ParseOutcome
// Tagged result of parsing one raw issue
// -----------------------------------------------------------------------------

export interface ParsedSubmission {
  success: true;
  submission: Submission;
}

export interface SkippedIssue {
  success: false;
  /** Null when the record was too malformed to carry a number */
  issue_number: number | null;
  reason: string;
}

export type ParseOutcome = ParsedSubmission | SkippedIssue;

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export type IssueState = 'open' | 'closed' | 'all';

export interface ContestConfig {
  /** Stable identifier used in element ids, [a-z0-9-]+ */
  id: string;
  name: string;
  /** Issue label that marks a submission for this contest */
  label: string;
  /** Title prefix that also marks a submission when the label is missing */
  title_prefix: string | null;
  /** Issue-form template file name for the "Add Entry" link */
  template: string | null;
  description: string;
  prize: string | null;
  deadline_display: string | null;
  /** Font Awesome icon classes */
  icon: string;
}

export interface ShowcaseSettings {
  title: string;
  tagline: string;
  ranking: RankingKey;
  /** Label that highlights a winning submission (null disables) */
  winner_label: string | null;
  issue_state: IssueState;
  /** Fetch and show the latest comment on each card (one request per commented issue) */
  show_last_comment: boolean;
  contests: ContestConfig[];
}

export interface RepositoryRef {
  owner: string;
  repo: string;
}

export interface Config {
  /** GitHub token; null means anonymous requests */
  token: string | null;
  repository: RepositoryRef;
  /** Absolute path of the generated HTML file */
  output_path: string;
  settings: ShowcaseSettings;
}

// -----------------------------------------------------------------------------
// Rendering
// -----------------------------------------------------------------------------

export interface ContestSection {
  contest: ContestConfig;
  /** Already sorted */
  submissions: Submission[];
}

export interface PageData {
  settings: ShowcaseSettings;
  repository: RepositoryRef;
  sections: ContestSection[];
}

// -----------------------------------------------------------------------------
// BuildReport
// Data passed to the summary renderer
// -----------------------------------------------------------------------------

export interface ContestReport {
  contest_id: string;
  contest_name: string;
  rendered: number;
  skipped: SkippedIssue[];
}

export interface BuildReport {
  contests: ContestReport[];
  output_path: string;
  bytes_written: number;
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const GITHUB_API_BASE = 'https://api.github.com';
export const GITHUB_WEB_BASE = 'https://github.com';

/** Maximum page size accepted by the issues endpoint */
export const ISSUES_PER_PAGE = 100;

/** Timeout for fetch requests to GitHub API (milliseconds) */
export const FETCH_TIMEOUT_MS = 10000;

export const DEFAULT_OUTPUT_FILE_NAME = 'index.html';
export const DEFAULT_SETTINGS_FILE_NAME = 'showcase.config.json';

export const MAX_DESCRIPTION_LENGTH = 200;
export const MAX_COMMENT_LENGTH = 120;
