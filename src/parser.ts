/**
 * Submission Parser
 * Layer: core
 *
 * Provided ports:
 *   - parser.parseIssueRecord
 *   - parser.parseIssueBody
 *   - parser.parseSubmission
 *   - parser.parseCommentSnippet
 *
 * Turns raw issue records into submissions. Issue-form bodies render each
 * field as a "### Label" heading followed by the answer; the parser reads
 * those sections and falls back to scanning the body for images.
 * A record that cannot become a submission yields a skip with a reason.
 */

import type {
  CommentSnippet,
  IssueAuthor,
  IssueRecord,
  ParseOutcome,
  RankingKey,
  ReactionCounts,
  SkippedIssue,
} from './types';
import { MAX_COMMENT_LENGTH, MAX_DESCRIPTION_LENGTH, REACTION_CONTENTS } from './types';
import { isARealObject, isCount, isHttpUrl, truncate } from './utils';

// -----------------------------------------------------------------------------
// Field keys (normalised "### Heading" text), in lookup order
// -----------------------------------------------------------------------------

const NAME_KEYS = ['designer_name', 'name', 'your_name', 'author'];
const IMAGE_KEYS = ['preview_image_url', 'preview_url', 'preview_image', 'image_url', 'image'];
const DESIGN_KEYS = [
  'design_prototype_link',
  'design_url',
  'prototype_link',
  'design_link',
  'figma_link',
];
const CATEGORY_KEYS = ['design_category', 'category'];

/** Placeholder GitHub writes for optional form fields left blank */
const NO_RESPONSE = '_No response_';

const DEFAULT_CATEGORY = 'Other';

const MARKDOWN_IMAGE_RE = /!\[[^\]]*\]\((https?:\/\/[^)\s]+)[^)]*\)/;
const HTML_IMAGE_RE = /<img\s[^>]*src="(https?:\/\/[^"]+)"/i;
const BARE_IMAGE_URL_RE = /(https?:\/\/\S+\.(?:png|jpe?g|gif|webp|svg))/i;
const HEADING_RE = /^###\s+(.+?)\s*#*\s*$/;
const COMMENT_IMAGE_RE = /!\[[^\]]*\]\([^)]*\)/g;
const COMMENT_LINK_RE = /\[([^\]]+)\]\([^)]+\)/g;

// -----------------------------------------------------------------------------
// Port: parser.parseIssueRecord
// -----------------------------------------------------------------------------

/**
 * Narrows a raw API record to an IssueRecord.
 * Returns null when number, title or html_url are missing.
 */
export function parseIssueRecord(raw: unknown): IssueRecord | null {
  if (!isARealObject(raw)) return null;

  const number = raw['number'];
  const title = raw['title'];
  const htmlUrl = raw['html_url'];
  if (typeof number !== 'number' || typeof title !== 'string' || typeof htmlUrl !== 'string') {
    return null;
  }

  const body = typeof raw['body'] === 'string' ? raw['body'] : null;
  const createdAt = typeof raw['created_at'] === 'string' ? raw['created_at'] : '';
  const updatedAt = typeof raw['updated_at'] === 'string' ? raw['updated_at'] : createdAt;

  return {
    number,
    title,
    html_url: htmlUrl,
    body,
    created_at: createdAt,
    updated_at: updatedAt,
    user: parseAuthor(raw['user']),
    labels: parseLabelNames(raw['labels']),
    reactions: parseReactions(raw['reactions']),
    comments: isCount(raw['comments']) ? raw['comments'] : 0,
    is_pull_request: raw['pull_request'] !== undefined && raw['pull_request'] !== null,
  };
}

function parseAuthor(raw: unknown): IssueAuthor | null {
  if (!isARealObject(raw) || typeof raw['login'] !== 'string' || raw['login'] === '') {
    return null;
  }
  return {
    login: raw['login'],
    html_url: typeof raw['html_url'] === 'string' ? raw['html_url'] : null,
    avatar_url: typeof raw['avatar_url'] === 'string' ? raw['avatar_url'] : null,
  };
}

/**
 * Labels arrive either as objects with a name or as bare strings.
 */
function parseLabelNames(raw: unknown): string[] {
  if (!Array.isArray(raw)) return [];
  const names: string[] = [];
  for (const label of raw) {
    if (typeof label === 'string') {
      names.push(label);
    } else if (isARealObject(label) && typeof label['name'] === 'string') {
      names.push(label['name']);
    }
  }
  return names;
}

/**
 * Reads the reaction rollup GitHub embeds in every issue.
 */
export function parseReactions(raw: unknown): ReactionCounts {
  const counts = emptyReactionCounts();
  if (!isARealObject(raw)) return counts;
  for (const content of REACTION_CONTENTS) {
    const value = raw[content];
    if (isCount(value)) {
      counts[content] = value;
    }
  }
  return counts;
}

export function emptyReactionCounts(): ReactionCounts {
  return {
    '+1': 0,
    '-1': 0,
    laugh: 0,
    hooray: 0,
    confused: 0,
    heart: 0,
    rocket: 0,
    eyes: 0,
  };
}

/**
 * Returns the ranking value for the given key.
 */
export function rankReactions(reactions: ReactionCounts, ranking: RankingKey): number {
  if (ranking === 'total') {
    return REACTION_CONTENTS.reduce((sum, content) => sum + reactions[content], 0);
  }
  return reactions[ranking];
}

// -----------------------------------------------------------------------------
// Port: parser.parseIssueBody
// -----------------------------------------------------------------------------

/**
 * Normalises a section heading to a lookup key ("Design / Prototype Link"
 * becomes "design_prototype_link").
 */
export function normalizeFieldKey(heading: string): string {
  return heading
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Splits an issue-form body into fields keyed by normalised heading.
 * Text before the first heading is ignored. The first occurrence of a
 * heading wins.
 */
export function parseIssueBody(body: string): Record<string, string> {
  const fields: Record<string, string> = {};
  let key: string | null = null;
  let buffer: string[] = [];

  const flush = (): void => {
    if (key !== null && !(key in fields)) {
      const value = buffer.join('\n').trim();
      fields[key] = value === NO_RESPONSE ? '' : value;
    }
  };

  for (const line of body.split(/\r?\n/)) {
    const heading = HEADING_RE.exec(line)?.[1];
    if (heading !== undefined) {
      flush();
      key = normalizeFieldKey(heading);
      buffer = [];
    } else if (key !== null) {
      buffer.push(line);
    }
  }
  flush();

  return fields;
}

// -----------------------------------------------------------------------------
// Field extraction
// -----------------------------------------------------------------------------

function firstField(fields: Record<string, string>, keys: string[]): string {
  for (const key of keys) {
    const value = fields[key]?.trim();
    if (value) return value;
  }
  return '';
}

/**
 * Pulls an http(s) image URL out of a field value that may be a bare URL,
 * a markdown image, or an <img> tag.
 */
function imageFromValue(value: string): string | null {
  if (isHttpUrl(value)) return value;
  const match = MARKDOWN_IMAGE_RE.exec(value) ?? HTML_IMAGE_RE.exec(value);
  return match?.[1] ?? null;
}

export function extractImageUrl(fields: Record<string, string>, body: string): string | null {
  for (const key of IMAGE_KEYS) {
    const value = fields[key]?.trim();
    if (!value) continue;
    const url = imageFromValue(value);
    if (url) return url;
  }

  const match =
    MARKDOWN_IMAGE_RE.exec(body) ?? HTML_IMAGE_RE.exec(body) ?? BARE_IMAGE_URL_RE.exec(body);
  const url = match?.[1];
  return url && isHttpUrl(url) ? url : null;
}

export function extractDesignUrl(fields: Record<string, string>): string | null {
  for (const key of DESIGN_KEYS) {
    const value = fields[key]?.trim();
    if (!value) continue;
    // Take the first token so trailing notes after the link are dropped
    const candidate = value.split(/\s+/)[0] ?? '';
    if (isHttpUrl(candidate)) return candidate;
  }
  return null;
}

/**
 * Cleans the free-text description: removes code-fence wrappers and task
 * list lines, then truncates.
 */
export function extractDescription(fields: Record<string, string>): string {
  let description = fields['description'] ?? '';
  description = description.replace(/^```[^\n]*\n([\s\S]*?)^```\s*$/gm, '$1');
  description = description.replace(/^```\w*\s*$/gm, '');
  description = description.replace(/^[-*]\s+\[[ xX]\].*$/gm, '');
  return truncate(description.trim(), MAX_DESCRIPTION_LENGTH);
}

function stripTitlePrefix(title: string, prefix: string | null): string {
  const trimmed = title.trim();
  if (prefix && trimmed.startsWith(prefix)) {
    return trimmed.slice(prefix.length).trim() || trimmed;
  }
  return trimmed;
}

// -----------------------------------------------------------------------------
// Port: parser.parseSubmission
// -----------------------------------------------------------------------------

export interface ParseOptions {
  ranking: RankingKey;
  winner_label: string | null;
  title_prefix: string | null;
}

function skip(issueNumber: number | null, reason: string): SkippedIssue {
  return { success: false, issue_number: issueNumber, reason };
}

/**
 * Parses one raw issue into a submission or a skip.
 * Never throws for malformed input.
 */
export function parseSubmission(raw: unknown, options: ParseOptions): ParseOutcome {
  const issue = parseIssueRecord(raw);
  if (!issue) {
    const number = isARealObject(raw) && typeof raw['number'] === 'number' ? raw['number'] : null;
    return skip(number, 'malformed issue record');
  }

  if (issue.is_pull_request) {
    return skip(issue.number, 'pull request');
  }

  const body = issue.body?.trim() ?? '';
  if (!body) {
    return skip(issue.number, 'empty issue body');
  }

  const fields = parseIssueBody(body);

  const authorName = firstField(fields, NAME_KEYS) || issue.user?.login || '';
  if (!authorName) {
    return skip(issue.number, 'missing author name');
  }

  const imageUrl = extractImageUrl(fields, body);
  const designUrl = extractDesignUrl(fields);
  if (!imageUrl && !designUrl) {
    return skip(issue.number, 'missing image and design link');
  }

  return {
    success: true,
    submission: {
      issue_number: issue.number,
      title: stripTitlePrefix(issue.title, options.title_prefix),
      author_name: authorName,
      author_url: issue.user?.html_url ?? null,
      avatar_url: issue.user?.avatar_url ?? null,
      image_url: imageUrl,
      design_url: designUrl,
      category: firstField(fields, CATEGORY_KEYS) || DEFAULT_CATEGORY,
      description: extractDescription(fields),
      reactions: issue.reactions,
      reaction_count: rankReactions(issue.reactions, options.ranking),
      issue_url: issue.html_url,
      created_at: issue.created_at,
      updated_at: issue.updated_at,
      is_winner: options.winner_label !== null && issue.labels.includes(options.winner_label),
      comment_count: issue.comments,
      last_comment: null,
    },
  };
}

// -----------------------------------------------------------------------------
// Port: parser.parseCommentSnippet
// -----------------------------------------------------------------------------

/**
 * Reduces a raw issue comment to a one-line preview: markdown images are
 * dropped, links keep their text, whitespace collapses.
 * Returns null when nothing readable is left or the record is malformed.
 */
export function parseCommentSnippet(raw: unknown): CommentSnippet | null {
  if (!isARealObject(raw) || typeof raw['body'] !== 'string') return null;

  const body = raw['body']
    .replace(COMMENT_IMAGE_RE, '')
    .replace(COMMENT_LINK_RE, '$1')
    .replace(/\s+/g, ' ')
    .trim();
  if (!body) return null;

  const author = parseAuthor(raw['user']);
  return {
    author_login: author?.login ?? 'ghost',
    author_url: author?.html_url ?? null,
    avatar_url: author?.avatar_url ?? null,
    body: truncate(body, MAX_COMMENT_LENGTH),
  };
}
