/**
 * Shared test helpers.
 */

import type { ContestConfig, ShowcaseSettings, Submission } from '../src/types';
import { emptyReactionCounts } from '../src/parser';

export const FORM_BODY = [
  '### Designer Name',
  '',
  'Alice Example',
  '',
  '### Preview Image URL',
  '',
  'https://images.example.com/alice.png',
  '',
  '### Design / Prototype Link',
  '',
  'https://www.figma.com/file/abc',
  '',
  '### Design Category',
  '',
  'Mobile App',
  '',
  '### Description',
  '',
  'A calm dark theme.',
].join('\n');

export function makeRawIssue(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    number: 1,
    title: '[Design] Dark mode dashboard',
    html_url: 'https://github.com/acme/showcase/issues/1',
    body: FORM_BODY,
    created_at: '2026-03-01T10:00:00Z',
    updated_at: '2026-03-02T09:30:00Z',
    user: {
      login: 'alice',
      html_url: 'https://github.com/alice',
      avatar_url: 'https://avatars.example.com/alice.png',
    },
    labels: [{ name: 'design-submission' }],
    comments: 0,
    reactions: {
      total_count: 3,
      '+1': 2,
      '-1': 0,
      laugh: 0,
      hooray: 0,
      confused: 0,
      heart: 1,
      rocket: 0,
      eyes: 0,
    },
    ...overrides,
  };
}

export function makeSubmission(overrides: Partial<Submission> = {}): Submission {
  return {
    issue_number: 1,
    title: 'Dark mode dashboard',
    author_name: 'Alice Example',
    author_url: 'https://github.com/alice',
    avatar_url: null,
    image_url: 'https://images.example.com/alice.png',
    design_url: null,
    category: 'Other',
    description: '',
    reactions: emptyReactionCounts(),
    reaction_count: 0,
    issue_url: 'https://github.com/acme/showcase/issues/1',
    created_at: '2026-03-01T10:00:00Z',
    updated_at: '2026-03-01T10:00:00Z',
    is_winner: false,
    comment_count: 0,
    last_comment: null,
    ...overrides,
  };
}

export function makeContest(overrides: Partial<ContestConfig> = {}): ContestConfig {
  return {
    id: 'app-redesign',
    name: 'App Redesign',
    label: 'design-submission',
    title_prefix: null,
    template: 'design-submission.yml',
    description: 'Redesign the application interface.',
    prize: '$25',
    deadline_display: 'June 1, 2027',
    icon: 'fa-solid fa-palette',
    ...overrides,
  };
}

export function makeSettings(overrides: Partial<ShowcaseSettings> = {}): ShowcaseSettings {
  return {
    title: 'Design Showcase',
    tagline: 'Vote with a thumbs up.',
    ranking: 'total',
    winner_label: 'winner',
    issue_state: 'open',
    show_last_comment: true,
    contests: [makeContest()],
    ...overrides,
  };
}

/**
 * Minimal stand-in for a fetch Response.
 */
export function mockResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
  statusText = '',
): {
  ok: boolean;
  status: number;
  statusText: string;
  json: () => Promise<unknown>;
  text: () => Promise<string>;
  headers: { get: (name: string) => string | null };
} {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    json: () => Promise.resolve(body),
    text: () => Promise.resolve(typeof body === 'string' ? body : JSON.stringify(body)),
    headers: {
      get: (name: string) => headers[name.toLowerCase()] ?? null,
    },
  };
}
