/**
 * Output Writer
 * Layer: infra
 *
 * Provided ports:
 *   - output.writePage
 *   - output.renderSummary
 *
 * Writes the generated page atomically, and renders the build summary for
 * the GitHub step summary and console.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { BuildReport } from './types';
import { getTmpPath } from './paths';
import { escapeMarkdownCell } from './utils';

// -----------------------------------------------------------------------------
// Port: output.writePage
// -----------------------------------------------------------------------------

export interface WritePageResult {
  success: true;
  bytes_written: number;
}

export interface WritePageError {
  success: false;
  error: string;
}

export type WritePageOutcome = WritePageResult | WritePageError;

/**
 * Writes the page to outputPath via a temp file and rename, fully replacing
 * any previous content. Creates the parent directory if needed.
 * Cleans up the temp file on failure.
 */
export function writePage(html: string, outputPath: string): WritePageOutcome {
  const tmpPath = getTmpPath(outputPath);

  try {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(tmpPath, html, 'utf-8');
    fs.renameSync(tmpPath, outputPath);
    return { success: true, bytes_written: Buffer.byteLength(html, 'utf-8') };
  } catch (err) {
    try {
      fs.unlinkSync(tmpPath);
    } catch {
      // Temp file may never have been created
    }
    const error = err as Error;
    return {
      success: false,
      error: `Failed to write page: ${error.message}`,
    };
  }
}

// -----------------------------------------------------------------------------
// Port: output.renderSummary
// -----------------------------------------------------------------------------

export interface SummaryResult {
  /** Markdown for step summary */
  markdown: string;
  /** Plain text for console */
  console: string;
}

export function renderSummary(report: BuildReport): SummaryResult {
  return { markdown: renderMarkdown(report), console: renderConsole(report) };
}

/**
 * Renders the Markdown summary for $GITHUB_STEP_SUMMARY.
 */
export function renderMarkdown(report: BuildReport): string {
  const lines: string[] = [];

  lines.push('## Design Showcase Build');
  lines.push('');
  lines.push(`**Output:** \`${report.output_path}\` (${report.bytes_written} bytes)`);
  lines.push('');
  lines.push('| Contest | Rendered | Skipped |');
  lines.push('|---------|---------:|--------:|');
  for (const contest of report.contests) {
    lines.push(
      `| ${escapeMarkdownCell(contest.contest_name)} | ${contest.rendered} | ${contest.skipped.length} |`,
    );
  }
  lines.push('');

  const skipped = report.contests.flatMap((contest) =>
    contest.skipped.map((skip) => ({ contest: contest.contest_name, skip })),
  );
  if (skipped.length > 0) {
    lines.push('### Skipped issues');
    lines.push('');
    for (const { contest, skip } of skipped) {
      const issue = skip.issue_number !== null ? `#${skip.issue_number}` : 'unnumbered record';
      lines.push(`- ${escapeMarkdownCell(contest)}: ${issue} (${escapeMarkdownCell(skip.reason)})`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Renders concise console output.
 */
export function renderConsole(report: BuildReport): string {
  const rendered = report.contests.reduce((sum, contest) => sum + contest.rendered, 0);
  const skipped = report.contests.reduce((sum, contest) => sum + contest.skipped.length, 0);

  const lines: string[] = [];
  lines.push(
    `Showcase written to ${report.output_path}: ${rendered} submissions, ${skipped} skipped`,
  );
  for (const contest of report.contests) {
    lines.push(
      `  - ${contest.contest_name}: ${contest.rendered} rendered, ${contest.skipped.length} skipped`,
    );
  }
  return lines.join('\n');
}

// -----------------------------------------------------------------------------
// GitHub Step Summary
// -----------------------------------------------------------------------------

/**
 * Appends markdown to the GitHub step summary when running in Actions.
 */
export function writeStepSummary(markdown: string): void {
  const summaryPath = process.env['GITHUB_STEP_SUMMARY'];
  if (summaryPath) {
    fs.appendFileSync(summaryPath, markdown + '\n');
  }
}
