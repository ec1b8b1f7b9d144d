/**
 * Interface Mapper
 *
 * End-to-end pipeline behind the CLI: validate the input directory, load its
 * configuration, scan and read the scripts, parse each one as it arrives,
 * resolve dependencies and write the Markdown reports.
 *
 * @module interfaceMapper
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { getLogger } from '../utils/logger.js';
import { normalizePath } from '../utils/paths.js';
import { atomicWrite } from '../utils/atomicWrite.js';
import {
  errnoCode,
  inputNotDirectory,
  inputNotFound,
  permissionDenied,
  reportWriteFailed,
} from '../errors/index.js';
import { loadConfig, type Config } from '../storage/config.js';
import { DEFAULT_MEMBER_OPTIONS } from './memberExtractor.js';
import { finalizeModel, parseUnitSafely, type ParseOptions } from './modelAssembler.js';
import { readSourceFiles, scanSourceFiles } from './sourceScanner.js';
import {
  loadLifecycleCatalog,
  renderIndexReport,
  renderUnitReport,
  reportFileName,
} from './reportGenerator.js';
import type { InterfaceModel, SourceUnit, UnitDiagnostic } from './model.js';

// ============================================================================
// Types
// ============================================================================

export type MapPhase = 'scanning' | 'parsing' | 'resolving' | 'writing';

export interface MapProgress {
  phase: MapPhase;
  /** Items completed in this phase */
  current: number;
  /** Items in this phase (0 while unknown) */
  total: number;
  currentFile?: string;
}

export type MapProgressCallback = (progress: MapProgress) => void;

export interface MapOptions {
  /** Defaults to `<inputDir>/<config.outputDirName>` */
  outputDir?: string;
  /** Build the model and render the reports without writing anything */
  dryRun?: boolean;
  /** Use this configuration instead of the input directory's config file */
  config?: Config;
  onProgress?: MapProgressCallback;
}

export interface MapResult {
  model: InterfaceModel;
  inputDir: string;
  outputDir: string;
  /** Report paths relative to `outputDir`, index last */
  reports: string[];
  /** Bytes of the successfully read sources */
  sourceBytes: number;
  /** Bytes of all rendered reports, written or not */
  reportBytes: number;
  durationMs: number;
}

/**
 * Name of the project index written next to the unit reports
 */
export const INDEX_REPORT_NAME = 'README.md';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parser options derived from the project configuration
 */
export function parseOptionsFromConfig(config: Config): ParseOptions {
  return {
    members: {
      ...DEFAULT_MEMBER_OPTIONS,
      includeSerializedFields: config.includeSerializedFields,
      includeConstants: config.includeConstants,
      includeOverridableMethods: config.includeOverridableMethods,
    },
    fileDocMinLength: config.fileDocMinLength,
    restrictedBuildSymbols: config.restrictedBuildSymbols,
  };
}

async function validateInputDir(inputDir: string): Promise<void> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(inputDir);
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'EACCES' || code === 'EPERM') throw permissionDenied(inputDir);
    throw inputNotFound(inputDir);
  }
  if (!stats.isDirectory()) {
    throw inputNotDirectory(inputDir);
  }
}

// ============================================================================
// Pipeline
// ============================================================================

export interface CollectedModel {
  model: InterfaceModel;
  inputDir: string;
  outputDir: string;
  config: Config;
  sourceBytes: number;
}

/**
 * Scan, read and parse an input directory into an interface model.
 * Nothing is written.
 */
export async function collectModel(
  inputDir: string,
  options: Omit<MapOptions, 'dryRun'> = {}
): Promise<CollectedModel> {
  const logger = getLogger();
  const root = normalizePath(inputDir);
  await validateInputDir(root);

  const config = options.config ?? (await loadConfig(root));
  const outputDir = options.outputDir
    ? normalizePath(options.outputDir)
    : path.join(root, config.outputDirName);
  const parseOptions = parseOptionsFromConfig(config);
  const onProgress = options.onProgress;

  onProgress?.({ phase: 'scanning', current: 0, total: 0 });
  const files = await scanSourceFiles(root, config, outputDir);
  onProgress?.({ phase: 'scanning', current: files.length, total: files.length });

  const units = new Map<string, SourceUnit>();
  const diagnostics = new Map<string, UnitDiagnostic>();
  let sourceBytes = 0;

  await readSourceFiles(root, files, config, (result, completed, total) => {
    if (result.ok) {
      sourceBytes += result.size;
      const parsed = parseUnitSafely(result.input, parseOptions);
      if (parsed.ok) {
        units.set(result.input.id, parsed.unit);
      } else {
        diagnostics.set(parsed.diagnostic.file, parsed.diagnostic);
      }
      onProgress?.({ phase: 'parsing', current: completed, total, currentFile: result.input.id });
    } else {
      diagnostics.set(result.diagnostic.file, result.diagnostic);
      onProgress?.({ phase: 'parsing', current: completed, total, currentFile: result.diagnostic.file });
    }
  });

  // Completion order varies between runs; the model follows scan order
  const orderedUnits = files.flatMap((file) => units.get(file) ?? []);
  const orderedDiagnostics = files.flatMap((file) => diagnostics.get(file) ?? []);

  onProgress?.({ phase: 'resolving', current: 0, total: 1 });
  const model = finalizeModel(orderedUnits, orderedDiagnostics);
  onProgress?.({ phase: 'resolving', current: 1, total: 1 });

  logger.info('InterfaceMapper', 'Model built', {
    units: model.units.length,
    edges: model.edges.length,
    skipped: model.diagnostics.length,
  });

  return { model, inputDir: root, outputDir, config, sourceBytes };
}

async function writeReport(outputDir: string, relativePath: string, content: string): Promise<void> {
  const target = path.join(outputDir, relativePath);
  try {
    await atomicWrite(target, content);
  } catch (error) {
    throw reportWriteFailed(target, error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * Map a directory of C# scripts to Markdown interface reports.
 *
 * @example
 * ```typescript
 * const result = await mapProject('/game/Assets/Scripts');
 * result.outputDir // => '/game/Assets/Scripts/_interface_maps'
 * result.reports   // => ['Player.md', 'Weapon.md', 'README.md']
 * ```
 */
export async function mapProject(inputDir: string, options: MapOptions = {}): Promise<MapResult> {
  const logger = getLogger();
  const startTime = Date.now();
  const collected = await collectModel(inputDir, options);
  const { model, outputDir } = collected;

  const catalog = loadLifecycleCatalog();
  const rendered: Array<[string, string]> = model.units.map((unit) => [
    reportFileName(unit.id),
    renderUnitReport(unit, catalog),
  ]);
  rendered.push([INDEX_REPORT_NAME, renderIndexReport(model, catalog)]);

  let reportBytes = 0;
  for (const [, content] of rendered) {
    reportBytes += Buffer.byteLength(content, 'utf-8');
  }

  if (options.dryRun) {
    logger.info('InterfaceMapper', 'Dry run, no reports written', { reports: rendered.length });
  } else {
    let written = 0;
    for (const [relativePath, content] of rendered) {
      await writeReport(outputDir, relativePath, content);
      written++;
      options.onProgress?.({
        phase: 'writing',
        current: written,
        total: rendered.length,
        currentFile: relativePath,
      });
    }
    logger.info('InterfaceMapper', 'Reports written', { outputDir, reports: written });
  }

  return {
    model,
    inputDir: collected.inputDir,
    outputDir,
    reports: rendered.map(([relativePath]) => relativePath),
    sourceBytes: collected.sourceBytes,
    reportBytes,
    durationMs: Date.now() - startTime,
  };
}
