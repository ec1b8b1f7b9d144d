/**
 * Path Utilities Module
 *
 * Cross-platform helpers for:
 * - Path normalization (absolute paths, separator normalization)
 * - Relative path conversion (always forward-slash separated)
 * - Containment checks
 * - Sanitizing paths shown in error messages
 */

import * as path from 'node:path';
import * as os from 'node:os';

// ============================================================================
// Path Normalization
// ============================================================================

/**
 * Resolve a path to absolute form without a trailing separator
 *
 * @example
 * ```typescript
 * normalizePath('./Assets/Scripts/')
 * // => '/home/dev/game/Assets/Scripts' (Unix)
 * ```
 */
export function normalizePath(inputPath: string): string {
  let normalized = path.normalize(path.resolve(inputPath));

  if (normalized.length > 1 && normalized.endsWith(path.sep)) {
    normalized = normalized.slice(0, -1);
  }

  // 'C:' means the drive's current directory, keep the root form
  if (process.platform === 'win32' && /^[A-Za-z]:$/.test(normalized)) {
    normalized = normalized + path.sep;
  }

  return normalized;
}

/**
 * Relative path from `basePath` to `absolutePath`, with forward slashes.
 * Source unit ids and report names are built from this.
 *
 * @example
 * ```typescript
 * toRelativePath('/game/Assets/Scripts/Player/Player.cs', '/game/Assets/Scripts')
 * // => 'Player/Player.cs'
 * ```
 */
export function toRelativePath(absolutePath: string, basePath: string): string {
  const relativePath = path.relative(normalizePath(basePath), normalizePath(absolutePath));
  return relativePath.replace(/\\/g, '/');
}

/**
 * Check if a path is the directory itself or inside it
 */
export function isWithinDirectory(targetPath: string, directoryPath: string): boolean {
  let target = normalizePath(targetPath);
  let dir = normalizePath(directoryPath);

  if (process.platform === 'win32') {
    target = target.toLowerCase();
    dir = dir.toLowerCase();
  }

  const prefix = dir.endsWith(path.sep) ? dir : dir + path.sep;
  return target === dir || target.startsWith(prefix);
}

/**
 * File name without directory and extension
 *
 * @example
 * ```typescript
 * getBaseName('Enemies/EnemyController.cs') // => 'EnemyController'
 * ```
 */
export function getBaseName(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

// ============================================================================
// Path Sanitization (for error messages)
// ============================================================================

/**
 * Shorten a path for display in error messages.
 *
 * Inside `projectPath` the result is `./relative`; inside the home directory
 * it is `~/relative`. Separators are always forward slashes.
 *
 * @example
 * ```typescript
 * sanitizePath('/home/dev/game/Assets/Player.cs', '/home/dev/game')
 * // => './Assets/Player.cs'
 * ```
 */
export function sanitizePath(fullPath: string, projectPath?: string): string {
  if (!fullPath) {
    return '<unknown>';
  }

  const normalizedPath = normalizePath(fullPath);

  if (projectPath && isWithinDirectory(normalizedPath, projectPath)) {
    return `./${toRelativePath(normalizedPath, projectPath)}`;
  }

  const homeDir = normalizePath(os.homedir());
  if (isWithinDirectory(normalizedPath, homeDir)) {
    return '~/' + path.relative(homeDir, normalizedPath).replace(/\\/g, '/');
  }

  return normalizedPath.replace(/\\/g, '/');
}
