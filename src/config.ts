/**
 * Configuration
 * Layer: infra
 *
 * Provided ports:
 *   - config.load
 *
 * Reads action inputs (INPUT_* variables) with environment fallbacks, and the
 * contest definitions from the settings JSON file.
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import type {
  Config,
  ContestConfig,
  IssueState,
  RankingKey,
  RepositoryRef,
  ShowcaseSettings,
} from './types';
import { DEFAULT_OUTPUT_FILE_NAME, DEFAULT_SETTINGS_FILE_NAME, REACTION_CONTENTS } from './types';
import { resolveWorkspacePath } from './paths';
import { isARealObject, isStringOrNull } from './utils';

const DEFAULT_TITLE = 'Design Showcase';
const DEFAULT_TAGLINE = 'Community design submissions, ranked by reactions.';
const DEFAULT_WINNER_LABEL = 'winner';
const DEFAULT_ICON = 'fa-solid fa-palette';
const CONTEST_ID_RE = /^[a-z0-9-]+$/;
const ISSUE_STATES: readonly IssueState[] = ['open', 'closed', 'all'];

// -----------------------------------------------------------------------------
// Port: config.load
// -----------------------------------------------------------------------------

/**
 * Loads the full run configuration.
 *
 * @throws Error naming the missing or invalid setting
 */
export function loadConfig(): Config {
  const token = core.getInput('token') || process.env['GITHUB_TOKEN'] || null;
  if (token) {
    core.setSecret(token);
  }

  const repository = parseRepository(
    core.getInput('repository') || process.env['GITHUB_REPOSITORY'] || '',
  );

  const outputPath = resolveWorkspacePath(
    core.getInput('output') || process.env['SHOWCASE_OUTPUT'] || DEFAULT_OUTPUT_FILE_NAME,
  );

  const settingsPath = resolveWorkspacePath(
    core.getInput('config') || process.env['SHOWCASE_CONFIG'] || DEFAULT_SETTINGS_FILE_NAME,
  );

  return {
    token,
    repository,
    output_path: outputPath,
    settings: readSettings(settingsPath),
  };
}

/**
 * Parses "owner/repo".
 */
export function parseRepository(value: string): RepositoryRef {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(
      'No repository provided. Set the repository input or GITHUB_REPOSITORY environment variable.',
    );
  }
  const match = /^([A-Za-z0-9-]+)\/([A-Za-z0-9._-]+)$/.exec(trimmed);
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid repository '${trimmed}'. Expected 'owner/repo'.`);
  }
  return { owner: match[1], repo: match[2] };
}

// -----------------------------------------------------------------------------
// Settings file
// -----------------------------------------------------------------------------

/**
 * Reads and validates the settings file.
 */
export function readSettings(settingsPath: string): ShowcaseSettings {
  let content: string;
  try {
    content = fs.readFileSync(settingsPath, 'utf-8');
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ENOENT') {
      throw new Error(`Settings file not found: ${settingsPath}`);
    }
    throw new Error(`Failed to read settings: ${error.message}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new Error(`Settings file is not valid JSON (${settingsPath}): ${(err as Error).message}`);
  }

  return parseSettings(raw);
}

/**
 * Validates parsed settings JSON and applies defaults.
 *
 * @throws Error naming the offending field
 */
export function parseSettings(raw: unknown): ShowcaseSettings {
  if (!isARealObject(raw)) {
    throw new Error('Invalid settings: expected a JSON object');
  }

  const title = optionalString(raw, 'title') ?? DEFAULT_TITLE;
  const tagline = optionalString(raw, 'tagline') ?? DEFAULT_TAGLINE;

  const ranking = raw['ranking'] ?? 'total';
  if (!isRankingKey(ranking)) {
    throw new Error(
      `Invalid settings: ranking must be 'total' or one of ${REACTION_CONTENTS.join(', ')}`,
    );
  }

  const winnerLabel = raw['winner_label'] === undefined ? DEFAULT_WINNER_LABEL : raw['winner_label'];
  if (!isStringOrNull(winnerLabel)) {
    throw new Error('Invalid settings: winner_label must be a string or null');
  }

  const issueState = raw['issue_state'] ?? 'open';
  if (!isIssueState(issueState)) {
    throw new Error(`Invalid settings: issue_state must be one of ${ISSUE_STATES.join(', ')}`);
  }

  const showLastComment = raw['show_last_comment'] ?? true;
  if (typeof showLastComment !== 'boolean') {
    throw new Error('Invalid settings: show_last_comment must be a boolean');
  }

  const rawContests = raw['contests'];
  if (!Array.isArray(rawContests) || rawContests.length === 0) {
    throw new Error('Invalid settings: contests must be a non-empty array');
  }

  const contests = rawContests.map((entry, index) => parseContest(entry, index));
  const seen = new Set<string>();
  for (const contest of contests) {
    if (seen.has(contest.id)) {
      throw new Error(`Invalid settings: duplicate contest id '${contest.id}'`);
    }
    seen.add(contest.id);
  }

  return {
    title,
    tagline,
    ranking,
    winner_label: winnerLabel || null,
    issue_state: issueState,
    show_last_comment: showLastComment,
    contests,
  };
}

function parseContest(raw: unknown, index: number): ContestConfig {
  const where = `contests[${index}]`;
  if (!isARealObject(raw)) {
    throw new Error(`Invalid settings: ${where} must be an object`);
  }

  const id = requiredString(raw, 'id', where);
  if (!CONTEST_ID_RE.test(id)) {
    throw new Error(`Invalid settings: ${where}.id must match [a-z0-9-]+`);
  }

  return {
    id,
    name: requiredString(raw, 'name', where),
    label: requiredString(raw, 'label', where),
    title_prefix: optionalString(raw, 'title_prefix', where),
    template: optionalString(raw, 'template', where),
    description: optionalString(raw, 'description', where) ?? '',
    prize: optionalString(raw, 'prize', where),
    deadline_display: optionalString(raw, 'deadline_display', where),
    icon: optionalString(raw, 'icon', where) ?? DEFAULT_ICON,
  };
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function isRankingKey(value: unknown): value is RankingKey {
  return value === 'total' || REACTION_CONTENTS.some((content) => content === value);
}

function isIssueState(value: unknown): value is IssueState {
  return ISSUE_STATES.some((state) => state === value);
}

function requiredString(obj: Record<string, unknown>, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`Invalid settings: ${where}.${key} must be a non-empty string`);
  }
  return value;
}

/**
 * Returns the string value, or null when absent, null or blank.
 */
function optionalString(obj: Record<string, unknown>, key: string, where?: string): string | null {
  const value = obj[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') {
    throw new Error(`Invalid settings: ${where ? `${where}.` : ''}${key} must be a string`);
  }
  return value.trim() === '' ? null : value;
}
