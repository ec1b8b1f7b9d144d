/**
 * Config Manager Module
 *
 * Project-level settings read from `interface-map.config.json` in the input
 * root:
 * - Zod schema validation
 * - Defaults for every field, and for the whole file when it is unusable
 * - Generation of a documented default file
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { atomicWriteJson } from '../utils/atomicWrite.js';

/**
 * Name of the configuration file looked up in the input directory
 */
export const CONFIG_FILE_NAME = 'interface-map.config.json';

// ============================================================================
// File Size Parser
// ============================================================================

const FILE_SIZE_REGEX = /^(\d+)(KB|MB)$/i;

/**
 * Parse a file size string to bytes
 *
 * @param size - Size string like "1MB" or "500KB"
 * @throws Error if format is invalid
 *
 * @example
 * ```typescript
 * parseFileSize('1MB')   // => 1048576
 * parseFileSize('500KB') // => 512000
 * ```
 */
export function parseFileSize(size: string): number {
  const match = FILE_SIZE_REGEX.exec(size.trim());
  if (!match) {
    throw new Error(
      `Invalid file size format: "${size}". Expected format like "1MB" or "500KB".`
    );
  }

  const value = parseInt(match[1], 10);
  return match[2].toUpperCase() === 'MB' ? value * 1024 * 1024 : value * 1024;
}

/**
 * Format bytes as a rounded size string ("2MB", "12KB")
 */
export function formatFileSize(bytes: number): string {
  if (bytes >= 1024 * 1024) {
    return `${Math.round(bytes / (1024 * 1024))}MB`;
  }
  return `${Math.round(bytes / 1024)}KB`;
}

// ============================================================================
// Config Schema
// ============================================================================

/**
 * Zod schema for configuration validation.
 *
 * Unknown keys are rejected so that a misspelled option is reported instead of
 * silently ignored. Underscore-prefixed documentation keys are removed before
 * validation.
 */
export const ConfigSchema = z
  .object({
    /** Glob patterns, relative to the input directory, of scripts to map */
    include: z.array(z.string().min(1)).default(['**/*.cs']),

    /** Additional glob patterns to skip (merged with the hard excludes) */
    exclude: z.array(z.string().min(1)).default([]),

    /** Larger files are skipped with a diagnostic */
    maxFileSize: z
      .string()
      .regex(FILE_SIZE_REGEX, 'Must be a valid file size like "1MB" or "500KB"')
      .default('1MB'),

    /** A warning is logged above this many files; all are still mapped */
    maxFiles: z.number().int().positive().default(10000),

    /** Files read in parallel per batch */
    concurrency: z.number().int().min(1).max(256).default(16),

    /** Output directory name, created inside the input directory */
    outputDirName: z.string().min(1).default('_interface_maps'),

    /** Shortest header comment accepted as file documentation */
    fileDocMinLength: z.number().int().min(0).default(40),

    /** Preprocessor symbols whose `#if` guard marks a file as restricted-build */
    restrictedBuildSymbols: z.array(z.string().min(1)).default(['UNITY_EDITOR']),

    /** Include non-public fields marked `[SerializeField]`/`[SerializeReference]` */
    includeSerializedFields: z.boolean().default(true),

    /** Include non-private `const` and `static readonly` fields */
    includeConstants: z.boolean().default(true),

    /** Include protected/internal virtual, override and abstract methods */
    includeOverridableMethods: z.boolean().default(true),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Config with documentation fields for generated config files
 */
export interface ConfigWithDocs extends Config {
  _comment?: string;
  _hardcodedExcludes?: string[];
  _availableOptions?: Record<string, string>;
}

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Used when no config file exists or the file is invalid
 */
export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

/**
 * Directories never scanned: build output, Unity's generated folders and VCS
 * metadata. The output directory is added at scan time.
 */
export const HARDCODED_EXCLUDES: readonly string[] = [
  '**/bin/**',
  '**/obj/**',
  '**/Library/**',
  '**/Temp/**',
  '**/node_modules/**',
  '**/.git/**',
];

// ============================================================================
// Config I/O Functions
// ============================================================================

/**
 * Path of the config file for an input directory
 */
export function getConfigPath(rootDir: string): string {
  return path.join(rootDir, CONFIG_FILE_NAME);
}

function stripDocumentationFields(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return raw;
  }
  return Object.fromEntries(Object.entries(raw).filter(([key]) => !key.startsWith('_')));
}

/**
 * Load configuration for an input directory.
 *
 * Falls back to {@link DEFAULT_CONFIG} (with a warning) when the file is not
 * valid JSON or fails validation; a missing file is not an error.
 *
 * @example
 * ```typescript
 * const config = await loadConfig('/game/Assets/Scripts');
 * config.include // => ['**\/*.cs']
 * ```
 */
export async function loadConfig(rootDir: string): Promise<Config> {
  const logger = getLogger();
  const configPath = getConfigPath(rootDir);

  if (!fs.existsSync(configPath)) {
    logger.debug('ConfigManager', 'No config file found, using defaults', { configPath });
    return { ...DEFAULT_CONFIG };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.promises.readFile(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn('ConfigManager', 'Failed to load config, using defaults', {
      configPath,
      error: message,
    });
    return { ...DEFAULT_CONFIG };
  }

  const result = ConfigSchema.safeParse(stripDocumentationFields(raw));
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
      .join('; ');
    logger.warn('ConfigManager', 'Config validation failed, using defaults', {
      configPath,
      errors,
    });
    return { ...DEFAULT_CONFIG };
  }

  logger.debug('ConfigManager', 'Config loaded successfully', { configPath });
  return result.data;
}

/**
 * Write a config file holding every default plus a description of each option
 *
 * @returns Path of the written file
 */
export async function generateDefaultConfig(rootDir: string): Promise<string> {
  const configPath = getConfigPath(rootDir);

  const configWithDocs: ConfigWithDocs = {
    _comment: 'Interface map configuration. Paths are relative to this directory.',
    _hardcodedExcludes: [...HARDCODED_EXCLUDES],
    _availableOptions: {
      include: 'Glob patterns of scripts to map (default: ["**/*.cs"])',
      exclude: 'Additional glob patterns to skip (merged with hardcoded excludes)',
      maxFileSize: 'Skip files larger than this, e.g. "1MB" or "500KB" (default: "1MB")',
      maxFiles: 'Warn when more files than this are found (default: 10000)',
      concurrency: 'Files read in parallel (default: 16)',
      outputDirName: 'Output directory inside the input directory (default: "_interface_maps")',
      fileDocMinLength: 'Minimum length of a file header comment to report (default: 40)',
      restrictedBuildSymbols: 'Symbols whose #if guard marks a file (default: ["UNITY_EDITOR"])',
      includeSerializedFields: 'Report [SerializeField] fields (default: true)',
      includeConstants: 'Report const and static readonly fields (default: true)',
      includeOverridableMethods: 'Report protected virtual/abstract methods (default: true)',
    },
    ...DEFAULT_CONFIG,
  };

  await atomicWriteJson(configPath, configWithDocs);
  getLogger().info('ConfigManager', 'Generated default config file', { configPath });
  return configPath;
}
