/**
 * Source Scanner
 *
 * Finds the C# scripts under an input directory and reads them for the
 * parser. Files that cannot be read are reported as diagnostics; the scan
 * itself only fails when the directory cannot be walked.
 *
 * @module sourceScanner
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { glob } from 'glob';
import { getLogger } from '../utils/logger.js';
import { isWithinDirectory, normalizePath, toRelativePath } from '../utils/paths.js';
import {
  errnoCode,
  fileNotFound,
  fileTooLarge,
  invalidPattern,
  permissionDenied,
  wrapError,
  ErrorCode,
  type MapperError,
} from '../errors/index.js';
import { HARDCODED_EXCLUDES, parseFileSize, type Config } from '../storage/config.js';
import type { SourceInput, UnitDiagnostic } from './model.js';

// ============================================================================
// Types
// ============================================================================

export type ReadResult =
  | { ok: true; input: SourceInput; size: number }
  | { ok: false; diagnostic: UnitDiagnostic };

/**
 * Called once per file as soon as its read settles
 */
export type ReadCallback = (result: ReadResult, completed: number, total: number) => void;

// ============================================================================
// Scanning
// ============================================================================

/**
 * Reject patterns that would escape the input directory
 */
function validatePatterns(patterns: readonly string[]): void {
  for (const pattern of patterns) {
    if (path.isAbsolute(pattern) || /^[A-Za-z]:/.test(pattern)) {
      throw invalidPattern(pattern, 'patterns must be relative to the input directory');
    }
    if (pattern.split(/[\\/]/).includes('..')) {
      throw invalidPattern(pattern, 'patterns must not contain ".." segments');
    }
  }
}

/**
 * Ignore patterns for a scan: configured excludes, the hard excludes and the
 * output directory when it lies inside the input directory
 */
export function buildIgnorePatterns(rootDir: string, config: Config, outputDir?: string): string[] {
  const ignore = [...HARDCODED_EXCLUDES, ...config.exclude];
  if (outputDir && isWithinDirectory(outputDir, rootDir)) {
    const relative = toRelativePath(outputDir, rootDir);
    if (relative) ignore.push(`${relative}/**`);
  }
  return ignore;
}

/**
 * Relative, forward-slash paths of the scripts to map, sorted
 *
 * @param rootDir - Input directory
 * @param outputDir - Output directory, excluded when inside `rootDir`
 */
export async function scanSourceFiles(
  rootDir: string,
  config: Config,
  outputDir?: string
): Promise<string[]> {
  const logger = getLogger();
  const cwd = normalizePath(rootDir);

  validatePatterns(config.include);
  validatePatterns(config.exclude);

  let files: string[];
  try {
    files = await glob(config.include, {
      cwd,
      nodir: true,
      dot: false,
      posix: true,
      ignore: buildIgnorePatterns(cwd, config, outputDir),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('SourceScanner', 'Failed to scan directory', { rootDir: cwd, error: message });
    throw permissionDenied(cwd);
  }

  const sorted = [...new Set(files.map((file) => file.replace(/\\/g, '/')))].sort();

  if (sorted.length > config.maxFiles) {
    logger.warn('SourceScanner', 'File count exceeds limit', {
      count: sorted.length,
      limit: config.maxFiles,
    });
  }

  logger.info('SourceScanner', 'File scan complete', { rootDir: cwd, files: sorted.length });
  return sorted;
}

// ============================================================================
// Reading
// ============================================================================

function toReadError(absolutePath: string, error: unknown): MapperError {
  switch (errnoCode(error)) {
    case 'EACCES':
    case 'EPERM':
      return permissionDenied(absolutePath);
    case 'ENOENT':
      return fileNotFound(absolutePath);
    default:
      return wrapError(error, ErrorCode.FILE_NOT_FOUND, `Failed to read ${absolutePath}`);
  }
}

/**
 * Read one file, enforcing the size limit
 */
export async function readSourceFile(
  rootDir: string,
  relativePath: string,
  maxBytes: number
): Promise<ReadResult> {
  const absolutePath = path.join(rootDir, relativePath);

  try {
    const stats = await fs.promises.stat(absolutePath);
    if (stats.size > maxBytes) {
      const error = fileTooLarge(absolutePath, stats.size, maxBytes);
      return { ok: false, diagnostic: { file: relativePath, code: error.code, message: error.message } };
    }

    const content = new Uint8Array(await fs.promises.readFile(absolutePath));
    return { ok: true, input: { id: relativePath, content }, size: content.byteLength };
  } catch (error) {
    const mapped = toReadError(absolutePath, error);
    return { ok: false, diagnostic: { file: relativePath, code: mapped.code, message: mapped.message } };
  }
}

/**
 * Read files in batches of `config.concurrency`.
 *
 * Results are returned in the order of `files`; `onRead` sees them in
 * completion order.
 */
export async function readSourceFiles(
  rootDir: string,
  files: readonly string[],
  config: Config,
  onRead?: ReadCallback
): Promise<ReadResult[]> {
  const logger = getLogger();
  const maxBytes = parseFileSize(config.maxFileSize);
  const results: ReadResult[] = [];
  let completed = 0;

  for (let start = 0; start < files.length; start += config.concurrency) {
    const batch = files.slice(start, start + config.concurrency);
    const settled = await Promise.all(
      batch.map(async (file) => {
        const result = await readSourceFile(rootDir, file, maxBytes);
        completed++;
        if (!result.ok) {
          logger.warn('SourceScanner', 'Skipping unreadable file', {
            file,
            code: result.diagnostic.code,
          });
        }
        onRead?.(result, completed, files.length);
        return result;
      })
    );
    results.push(...settled);
  }

  return results;
}
