#!/usr/bin/env node
/**
 * Main Entry
 * Layer: action
 *
 * Builds the showcase page. Runs as a workflow step or locally; exits
 * non-zero on configuration, fetch or write failure.
 *
 * Required ports:
 *   - config.load
 *   - build.buildShowcase
 *   - output.renderSummary
 */

import * as core from '@actions/core';
import { loadConfig } from './config';
import { buildShowcase } from './build';
import { renderSummary, writeStepSummary } from './output';

async function run(): Promise<void> {
  try {
    const config = loadConfig();
    const report = await buildShowcase(config);

    const { markdown, console: consoleText } = renderSummary(report);
    core.info(consoleText);
    writeStepSummary(markdown);
  } catch (error) {
    const err = error as Error;
    core.setFailed(err.message);
  }
}

void run();
