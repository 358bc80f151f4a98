/**
 * Path Resolver
 * Layer: infra
 *
 * Provided ports:
 *   - paths.resolveWorkspacePath
 *   - paths.tmpPath
 *
 * Resolves configured paths against the checkout directory.
 */

import * as path from 'path';

// -----------------------------------------------------------------------------
// Port: paths.resolveWorkspacePath
// -----------------------------------------------------------------------------

/**
 * Returns $GITHUB_WORKSPACE when set, otherwise the working directory.
 */
export function getWorkspaceDir(): string {
  const workspace = process.env['GITHUB_WORKSPACE'];
  return workspace ? workspace : process.cwd();
}

/**
 * Resolves a path relative to the workspace. Absolute paths pass through.
 */
export function resolveWorkspacePath(target: string): string {
  return path.resolve(getWorkspaceDir(), target);
}

// -----------------------------------------------------------------------------
// Port: paths.tmpPath
// -----------------------------------------------------------------------------

/**
 * Returns the temporary sibling used for an atomic write of target.
 * Same directory, so the final rename never crosses filesystems.
 */
export function getTmpPath(target: string): string {
  return path.join(path.dirname(target), `.${path.basename(target)}.tmp`);
}
