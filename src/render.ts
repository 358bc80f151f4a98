/**
 * Page Renderer
 * Layer: core
 *
 * Provided ports:
 *   - render.sortSubmissions
 *   - render.renderPage
 *
 * Ranks submissions and renders the static showcase document.
 * Output depends only on its input: no clock, no randomness.
 */

import type {
  ContestConfig,
  ContestSection,
  PageData,
  ReactionContent,
  RepositoryRef,
  Submission,
} from './types';
import { GITHUB_WEB_BASE, REACTION_CONTENTS } from './types';
import { escapeHtml } from './utils';

const REACTION_EMOJI: Record<ReactionContent, string> = {
  '+1': '👍',
  '-1': '👎',
  laugh: '😄',
  hooray: '🎉',
  confused: '😕',
  heart: '❤️',
  rocket: '🚀',
  eyes: '👀',
};

const CATEGORY_BADGE_CLASSES: Record<string, string> = {
  'UI / Website Redesign': 'bg-blue-100 text-blue-700',
  'Logo / Brand Identity': 'bg-purple-100 text-purple-700',
  'Banner / Marketing': 'bg-yellow-100 text-yellow-700',
  'Icon Set': 'bg-green-100 text-green-700',
  'Mobile App': 'bg-indigo-100 text-indigo-700',
};
const DEFAULT_BADGE_CLASSES = 'bg-gray-100 text-gray-700';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// -----------------------------------------------------------------------------
// Port: render.sortSubmissions
// -----------------------------------------------------------------------------

/**
 * Orders by reaction count descending, then creation time ascending, then
 * issue number ascending.
 */
export function compareSubmissions(a: Submission, b: Submission): number {
  if (a.reaction_count !== b.reaction_count) {
    return b.reaction_count - a.reaction_count;
  }
  if (a.created_at !== b.created_at) {
    return a.created_at < b.created_at ? -1 : 1;
  }
  return a.issue_number - b.issue_number;
}

/**
 * Returns a new sorted array; the input is left untouched.
 */
export function sortSubmissions(submissions: readonly Submission[]): Submission[] {
  return [...submissions].sort(compareSubmissions);
}

// -----------------------------------------------------------------------------
// Port: render.renderPage
// -----------------------------------------------------------------------------

/**
 * Renders the complete HTML document.
 */
export function renderPage(page: PageData): string {
  const { settings, repository, sections } = page;
  const title = escapeHtml(settings.title);
  const repoUrl = escapeHtml(repositoryUrl(repository));
  const total = sections.reduce((sum, section) => sum + section.submissions.length, 0);
  const lastUpdated = latestUpdate(sections);

  const nav = sections
    .map(
      ({ contest, submissions }) =>
        `<a href="#contest-${escapeHtml(contest.id)}" class="hover:text-[#E10101] transition-colors">` +
        `${escapeHtml(contest.name)} <span class="text-xs text-gray-400">${submissions.length}</span></a>`,
    )
    .join('\n          ');

  const body = sections.map((section) => renderSection(section, repository)).join('\n');

  const updatedNote = lastUpdated
    ? `\n      <p class="text-xs text-gray-400 mb-4 text-right">Last updated ${escapeHtml(formatTimestamp(lastUpdated))}</p>`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <meta name="description" content="${escapeHtml(settings.tagline)}" />
  <title>${title}</title>
  <script src="https://cdn.tailwindcss.com"></script>
  <link rel="stylesheet" href="https://cdnjs.cloudflare.com/ajax/libs/font-awesome/6.5.1/css/all.min.css" crossorigin="anonymous" referrerpolicy="no-referrer" />
</head>
<body class="bg-gray-50 text-gray-900 min-h-screen flex flex-col font-sans antialiased">
  <header class="bg-white border-b border-[#E5E5E5]">
    <div class="max-w-7xl mx-auto px-4 py-10 text-center">
      <h1 class="text-4xl font-black mb-3">${title}</h1>
      <p class="max-w-2xl mx-auto text-lg text-gray-600">${escapeHtml(settings.tagline)}</p>
      <p class="mt-4 text-sm text-gray-500">${total} submission${total === 1 ? '' : 's'} across ${sections.length} contest${sections.length === 1 ? '' : 's'}</p>
      <nav class="mt-6 flex justify-center gap-6 text-sm font-medium flex-wrap" aria-label="Contests">
          ${nav}
      </nav>
    </div>
  </header>
  <main id="showcase" class="flex-1">
    <div class="max-w-7xl mx-auto px-4 py-12">${updatedNote}
${body}
    </div>
  </main>
  <footer class="bg-white border-t border-[#E5E5E5]">
    <div class="max-w-7xl mx-auto px-4 py-8 text-sm text-gray-500 flex justify-between">
      <p>Built from GitHub issues.</p>
      <a href="${repoUrl}" target="_blank" rel="noopener" class="hover:text-[#E10101] inline-flex items-center gap-1">
        <i class="fa-brands fa-github" aria-hidden="true"></i> Source
      </a>
    </div>
  </footer>
</body>
</html>
`;
}

// -----------------------------------------------------------------------------
// Sections
// -----------------------------------------------------------------------------

export function renderSection(section: ContestSection, repository: RepositoryRef): string {
  const { contest, submissions } = section;
  const id = escapeHtml(contest.id);
  const count = submissions.length;
  const winners = submissions.filter((submission) => submission.is_winner).length;

  const facts: string[] = [];
  if (contest.prize) {
    facts.push(
      `<span><i class="fa-solid fa-trophy" aria-hidden="true"></i> ${escapeHtml(contest.prize)} prize</span>`,
    );
  }
  if (contest.deadline_display) {
    facts.push(
      `<span><i class="fa-solid fa-calendar-day" aria-hidden="true"></i> Ends ${escapeHtml(contest.deadline_display)}</span>`,
    );
  }
  facts.push(
    `<span><i class="fa-solid fa-images" aria-hidden="true"></i> ${count} submission${count === 1 ? '' : 's'}</span>`,
  );

  const winnerBanner =
    winners > 0
      ? `
        <div class="mb-6 bg-amber-50 border border-amber-300 rounded-xl px-5 py-4" data-winner-banner>
          <p class="font-semibold text-amber-800"><i class="fa-solid fa-trophy" aria-hidden="true"></i> Winner${winners > 1 ? 's' : ''} selected: ${winners} winning design${winners > 1 ? 's are' : ' is'} highlighted below.</p>
        </div>`
      : '';

  const cards =
    count > 0
      ? submissions.map(renderCard).join('\n')
      : `          <p class="col-span-full text-center text-gray-500 py-16" data-empty>No submissions yet. Be the first!</p>`;

  return `      <section id="contest-${id}" class="mb-16" aria-labelledby="heading-${id}">
        <div class="mb-6 p-5 bg-white rounded-xl border border-[#E5E5E5] flex flex-col sm:flex-row justify-between gap-4">
          <div>
            <h2 id="heading-${id}" class="text-xl font-bold flex items-center gap-2">
              <i class="${escapeHtml(contest.icon)} text-[#E10101]" aria-hidden="true"></i> ${escapeHtml(contest.name)}
            </h2>
            <p class="mt-1 text-sm text-gray-500">${escapeHtml(contest.description)}</p>
            <div class="mt-2 flex gap-4 text-sm font-medium text-[#E10101] flex-wrap">
              ${facts.join('\n              ')}
            </div>
          </div>
          <a href="${escapeHtml(submitUrl(repository, contest))}" target="_blank" rel="noopener" class="self-start bg-[#E10101] text-white text-sm font-semibold px-4 py-2 rounded-md">
            <i class="fa-solid fa-plus" aria-hidden="true"></i> Add Entry
          </a>
        </div>${winnerBanner}
        <div class="grid grid-cols-1 sm:grid-cols-2 lg:grid-cols-3 gap-6">
${cards}
        </div>
      </section>`;
}

// -----------------------------------------------------------------------------
// Cards
// -----------------------------------------------------------------------------

export function renderCard(submission: Submission): string {
  const issueUrl = escapeHtml(submission.issue_url);
  const title = escapeHtml(submission.title);
  const number = submission.issue_number;

  const preview = submission.image_url
    ? `<img src="${escapeHtml(submission.image_url)}" alt="${title} preview" loading="lazy" class="w-full h-full object-cover" />`
    : `<i class="fa-solid fa-image text-4xl text-gray-400" aria-hidden="true"></i>`;

  const avatar = submission.avatar_url
    ? `<img src="${escapeHtml(submission.avatar_url)}" alt="" class="w-6 h-6 rounded-full" aria-hidden="true" />`
    : `<i class="fa-solid fa-user-circle text-lg" aria-hidden="true"></i>`;

  const author = submission.author_url
    ? `<a href="${escapeHtml(submission.author_url)}" target="_blank" rel="noopener" class="text-[#E10101] hover:underline font-medium">${escapeHtml(submission.author_name)}</a>`
    : `<span class="font-medium">${escapeHtml(submission.author_name)}</span>`;

  const designLink = submission.design_url
    ? `<a href="${escapeHtml(submission.design_url)}" target="_blank" rel="noopener" class="text-[#E10101] hover:underline text-sm"><i class="fa-solid fa-arrow-up-right-from-square" aria-hidden="true"></i> View Design</a>`
    : '';

  const winnerBadge = submission.is_winner
    ? `\n            <div class="absolute top-2 left-2 bg-amber-400 text-amber-900 text-xs font-bold px-2.5 py-1 rounded-full"><i class="fa-solid fa-trophy" aria-hidden="true"></i> Winner</div>`
    : '';

  const badgeClasses = CATEGORY_BADGE_CLASSES[submission.category] ?? DEFAULT_BADGE_CLASSES;
  const description = submission.description
    ? escapeHtml(submission.description)
    : 'No description provided.';

  return `          <article class="relative bg-white rounded-2xl border border-[#E5E5E5] overflow-hidden flex flex-col${submission.is_winner ? ' ring-2 ring-amber-400' : ''}" data-issue="${number}" data-reactions="${submission.reaction_count}"${submission.is_winner ? ' data-winner="true"' : ''}>${winnerBadge}
            <a href="${issueUrl}" target="_blank" rel="noopener" class="flex items-center justify-center aspect-square bg-gray-100 overflow-hidden">${preview}</a>
            <div class="p-5 flex flex-col gap-3 flex-1">
              <div class="flex items-center justify-between gap-2 text-xs">
                <span class="font-medium px-2 py-0.5 rounded-full ${badgeClasses}">${escapeHtml(submission.category)}</span>
                <span class="text-gray-400">#${number} · ${escapeHtml(submission.created_at.slice(0, 10))}</span>
              </div>
              <h3 class="text-base font-semibold"><a href="${issueUrl}" target="_blank" rel="noopener">${title}</a></h3>
              <p class="text-sm text-gray-600 flex-1">${description}</p>
              <div class="flex items-center gap-2 text-sm text-gray-500">${avatar} ${author}</div>
              ${renderComments(submission)}
              <div class="flex items-center justify-between gap-2 pt-2 border-t border-[#E5E5E5]">
                <div class="flex items-center gap-1 flex-wrap" aria-label="Reactions">${renderReactions(submission)}</div>
                <div class="flex items-center gap-3">${designLink}<a href="${issueUrl}" target="_blank" rel="noopener" class="text-sm font-medium border border-[#E10101] text-[#E10101] rounded-md px-3 py-1" aria-label="View issue #${number}"><i class="fa-brands fa-github" aria-hidden="true"></i> Issue</a></div>
              </div>
            </div>
          </article>`;
}

/**
 * Latest comment preview with the comment count, the count alone when no
 * preview is available, or an invitation to comment.
 */
function renderComments(submission: Submission): string {
  const issueUrl = escapeHtml(submission.issue_url);
  const count = submission.comment_count;
  const countLabel = `${count} comment${count === 1 ? '' : 's'}`;
  const comment = submission.last_comment;

  if (comment) {
    const login = escapeHtml(comment.author_login);
    const avatar = comment.avatar_url
      ? `<img src="${escapeHtml(comment.avatar_url)}" alt="" class="w-5 h-5 rounded-full shrink-0" aria-hidden="true" />`
      : `<i class="fa-solid fa-user-circle text-base shrink-0" aria-hidden="true"></i>`;
    const commenter = comment.author_url
      ? `<a href="${escapeHtml(comment.author_url)}" target="_blank" rel="noopener" class="font-medium text-gray-500">${login}</a>`
      : `<span class="font-medium text-gray-500">${login}</span>`;
    return `<div class="flex items-start gap-1.5 text-xs text-gray-400" data-comments="${count}">${avatar}<span><a href="${issueUrl}" target="_blank" rel="noopener">${countLabel}</a> · ${commenter}: ${escapeHtml(comment.body)}</span></div>`;
  }

  if (count > 0) {
    return `<a href="${issueUrl}" target="_blank" rel="noopener" class="inline-flex items-center gap-1.5 text-xs text-gray-400" data-comments="${count}"><i class="fa-regular fa-comment" aria-hidden="true"></i> ${countLabel}</a>`;
  }

  return `<a href="${issueUrl}" target="_blank" rel="noopener" class="inline-flex items-center gap-1.5 text-xs text-gray-400" data-comments="0" aria-label="Be the first to comment on GitHub"><i class="fa-regular fa-comment" aria-hidden="true"></i> Be the first to comment!</a>`;
}

function renderReactions(submission: Submission): string {
  const pills = REACTION_CONTENTS.filter((content) => submission.reactions[content] > 0).map(
    (content) =>
      `<span class="inline-flex items-center gap-1 text-sm bg-gray-100 rounded-full px-2 py-0.5">${REACTION_EMOJI[content]} <span>${submission.reactions[content]}</span></span>`,
  );
  if (pills.length > 0) return pills.join('');
  return `<a href="${escapeHtml(submission.issue_url)}" target="_blank" rel="noopener" class="text-xs text-gray-400">Be the first to react!</a>`;
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

export function repositoryUrl(repository: RepositoryRef): string {
  return `${GITHUB_WEB_BASE}/${repository.owner}/${repository.repo}`;
}

function submitUrl(repository: RepositoryRef, contest: ContestConfig): string {
  const base = `${repositoryUrl(repository)}/issues/new`;
  return contest.template ? `${base}?template=${encodeURIComponent(contest.template)}` : base;
}

/**
 * Most recent updated_at across all rendered submissions, or null.
 */
export function latestUpdate(sections: readonly ContestSection[]): string | null {
  let latest: string | null = null;
  for (const section of sections) {
    for (const submission of section.submissions) {
      if (submission.updated_at && (latest === null || submission.updated_at > latest)) {
        latest = submission.updated_at;
      }
    }
  }
  return latest;
}

/**
 * Formats an ISO timestamp as "05 Mar 2026 14:07 UTC".
 * Unparseable input is returned unchanged.
 */
export function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  const pad = (n: number): string => String(n).padStart(2, '0');
  const month = MONTHS[date.getUTCMonth()] ?? '';
  return `${pad(date.getUTCDate())} ${month} ${date.getUTCFullYear()} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`;
}
