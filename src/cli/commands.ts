/**
 * CLI Commands Module
 *
 * Commands:
 * - map: Write Markdown interface reports for a directory of C# scripts
 * - deps: Print the script dependency graph
 * - init: Write a documented default configuration file
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import cliProgress from 'cli-progress';
import * as fs from 'node:fs';

import { collectModel, mapProject, type MapProgress, type MapResult } from '../engines/interfaceMapper.js';
import { primaryTypeName } from '../engines/dependencyResolver.js';
import type { InterfaceModel } from '../engines/model.js';
import { formatFileSize, generateDefaultConfig } from '../storage/config.js';
import { isMapperError } from '../errors/index.js';
import { normalizePath } from '../utils/paths.js';
import { createLogger, getLogger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface MapCommandOptions {
  json?: boolean;
  verbose?: boolean;
  dryRun?: boolean;
  logDir?: string;
}

export interface DepsCommandOptions {
  json?: boolean;
  verbose?: boolean;
}

// ============================================================================
// Output Formatters
// ============================================================================

function printHeader(text: string): void {
  console.log('');
  console.log(chalk.cyan.bold(text));
  console.log(chalk.cyan('='.repeat(text.length)));
  console.log('');
}

function printSuccess(text: string): void {
  console.log(chalk.green('  ' + text));
}

function printError(text: string): void {
  console.error(chalk.red('  Error: ' + text));
}

function printWarning(text: string): void {
  console.log(chalk.yellow('  Warning: ' + text));
}

function printInfo(label: string, value: string | number): void {
  console.log(chalk.gray(`  ${label}: `) + chalk.white(String(value)));
}

/**
 * Reports size as a share of the source size, one decimal
 *
 * @example
 * ```typescript
 * formatRatio(250, 1000) // => '25.0%'
 * ```
 */
export function formatRatio(reportBytes: number, sourceBytes: number): string {
  const ratio = sourceBytes > 0 ? (reportBytes / sourceBytes) * 100 : 0;
  return `${ratio.toFixed(1)}%`;
}

/**
 * One `Unit -> Dependency` line per edge, using the unit's primary type name
 * (the unit id when it declares no type)
 */
export function formatAdjacency(model: InterfaceModel): string[] {
  const lines: string[] = [];
  for (const unit of model.units) {
    const from = primaryTypeName(unit) ?? unit.id;
    for (const dependency of unit.dependencies) {
      lines.push(`${from} -> ${dependency}`);
    }
  }
  return lines;
}

/**
 * Object printed by `map --json`
 */
export function buildMapSummary(result: MapResult, dryRun: boolean): Record<string, unknown> {
  return {
    success: true,
    dryRun,
    inputDir: result.inputDir,
    outputDir: result.outputDir,
    units: result.model.units.length,
    edges: result.model.edges.length,
    reports: result.reports,
    sourceBytes: result.sourceBytes,
    reportBytes: result.reportBytes,
    diagnostics: result.model.diagnostics,
    durationMs: result.durationMs,
  };
}

// ============================================================================
// Progress Display
// ============================================================================

/**
 * Progress callback driving a spinner for scanning/resolving/writing and a
 * bar for parsing. `stop()` clears whatever is still on screen.
 */
function createProgressDisplay(): { onProgress: (progress: MapProgress) => void; stop: () => void } {
  let spinner: Ora | null = null;
  let bar: cliProgress.SingleBar | null = null;

  const stopBar = (): void => {
    if (bar) {
      bar.stop();
      bar = null;
    }
  };

  const onProgress = (progress: MapProgress): void => {
    switch (progress.phase) {
      case 'scanning':
        // Reported once when the scan starts and once when it ends
        if (!spinner) {
          spinner = ora('  Scanning scripts...').start();
        } else {
          spinner.succeed(`  Found ${progress.total.toLocaleString()} scripts`);
          spinner = null;
        }
        break;

      case 'parsing':
        if (!bar) {
          bar = new cliProgress.SingleBar(
            {
              format: '  Parsing  {bar} {value}/{total} | {file}',
              barCompleteChar: '█',
              barIncompleteChar: '░',
              hideCursor: true,
              clearOnComplete: false,
            },
            cliProgress.Presets.shades_classic
          );
          bar.start(progress.total, 0, { file: '' });
        }
        bar.update(progress.current, { file: progress.currentFile ?? '' });
        break;

      case 'resolving':
        stopBar();
        if (progress.current === 0) {
          spinner?.stop();
          spinner = ora('  Resolving dependencies...').start();
        } else if (spinner) {
          spinner.succeed('  Dependencies resolved');
          spinner = null;
        }
        break;

      case 'writing':
        if (!spinner) spinner = ora('  Writing reports...').start();
        spinner.text = `  Writing reports... (${progress.current}/${progress.total})`;
        if (progress.current === progress.total) {
          spinner.succeed(`  Wrote ${progress.total} reports`);
          spinner = null;
        }
        break;
    }
  };

  const stop = (): void => {
    stopBar();
    if (spinner) {
      spinner.stop();
      spinner = null;
    }
  };

  return { onProgress, stop };
}

// ============================================================================
// Error Handling
// ============================================================================

function isDebugEnabled(): boolean {
  return Boolean(process.env.DEBUG || process.env.INTERFACE_MAP_DEBUG);
}

function errorMessage(error: unknown): string {
  if (isMapperError(error)) return error.userMessage;
  return error instanceof Error ? error.message : String(error);
}

function handleError(error: unknown): void {
  console.error('');

  printError(errorMessage(error));
  if (isDebugEnabled()) {
    if (isMapperError(error)) {
      console.error(chalk.gray('  Developer: ' + error.developerMessage));
    } else if (error instanceof Error && error.stack) {
      console.error(chalk.gray('  Stack: ' + error.stack));
    }
  } else {
    console.error(chalk.gray('  For more details, run with DEBUG=1 environment variable'));
  }
  console.error('');

  process.exitCode = 1;
}

function printJsonError(error: unknown): void {
  const payload: Record<string, unknown> = { success: false, error: errorMessage(error) };
  if (isMapperError(error)) payload.code = error.code;
  console.log(JSON.stringify(payload));
  process.exitCode = 1;
}

function prepareLogging(options: { json?: boolean; verbose?: boolean; logDir?: string }): void {
  if (options.logDir) {
    createLogger(normalizePath(options.logDir));
  }
  // Console logging would tear through the spinner and break JSON output
  getLogger().setSilentConsole(!options.verbose || Boolean(options.json));
}

// ============================================================================
// Command: map
// ============================================================================

/**
 * Map a directory of scripts and write the reports
 */
export async function mapCommand(
  inputDir: string,
  outputDir: string | undefined,
  options: MapCommandOptions
): Promise<void> {
  prepareLogging(options);
  const dryRun = Boolean(options.dryRun);

  if (options.json) {
    try {
      const result = await mapProject(inputDir, { outputDir, dryRun });
      console.log(JSON.stringify(buildMapSummary(result, dryRun)));
    } catch (error) {
      printJsonError(error);
    }
    await getLogger().flush();
    return;
  }

  printHeader('C# Interface Map');
  const display = createProgressDisplay();

  try {
    const result = await mapProject(inputDir, { outputDir, dryRun, onProgress: display.onProgress });
    display.stop();

    console.log('');
    printSuccess(dryRun ? 'Dry run complete, nothing written.' : 'Interface maps generated!');
    console.log('');
    printInfo('Scripts', result.model.units.length.toLocaleString());
    printInfo('Dependencies', result.model.edges.length.toLocaleString());
    printInfo('Output', result.outputDir);
    printInfo(
      'Size',
      `${formatFileSize(result.sourceBytes)} of source -> ${formatFileSize(result.reportBytes)} of reports ` +
        `(${formatRatio(result.reportBytes, result.sourceBytes)})`
    );
    printInfo('Duration', `${result.durationMs}ms`);

    for (const diagnostic of result.model.diagnostics) {
      printWarning(`Skipped ${diagnostic.file} (${diagnostic.code})`);
    }
    console.log('');
  } catch (error) {
    display.stop();
    handleError(error);
  }
  await getLogger().flush();
}

// ============================================================================
// Command: deps
// ============================================================================

/**
 * Print the dependency adjacency list without writing reports
 */
export async function depsCommand(inputDir: string, options: DepsCommandOptions): Promise<void> {
  prepareLogging(options);

  try {
    const { model } = await collectModel(inputDir);

    if (options.json) {
      console.log(JSON.stringify({ success: true, edges: model.edges, diagnostics: model.diagnostics }));
      return;
    }

    const lines = formatAdjacency(model);
    if (lines.length === 0) {
      console.log(chalk.gray('No dependencies between scripts.'));
    }
    for (const line of lines) {
      console.log(line);
    }
  } catch (error) {
    if (options.json) {
      printJsonError(error);
    } else {
      handleError(error);
    }
  }
}

// ============================================================================
// Command: init
// ============================================================================

/**
 * Write `interface-map.config.json` with every default into the directory
 */
export async function initCommand(inputDir: string): Promise<void> {
  const root = normalizePath(inputDir);
  getLogger().setSilentConsole(true);
  try {
    const configPath = await generateDefaultConfig(root);
    printSuccess(`Created ${configPath}`);
  } catch (error) {
    handleError(error);
  }
}

// ============================================================================
// CLI Program
// ============================================================================

function getVersion(): string {
  try {
    const packageJsonPath = new URL('../../package.json', import.meta.url);
    const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '0.0.0';
  } catch (error) {
    getLogger().debug('CLI', 'Could not read package version', {
      error: error instanceof Error ? error.message : String(error),
    });
    return '0.0.0';
  }
}

/**
 * Create and configure the CLI program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name('interface-map')
    .description('Condensed Markdown interface maps of Unity C# scripts')
    .version(getVersion(), '-v, --version', 'Show version number');

  program
    .command('map <inputDir> [outputDir]')
    .description('Generate interface reports (default output: <inputDir>/_interface_maps)')
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Show detailed logging output')
    .option('--dry-run', 'Parse and render without writing files')
    .option('--log-dir <dir>', 'Also write logs to this directory')
    .action(mapCommand);

  program
    .command('deps <inputDir>')
    .description('Print the dependency graph between scripts')
    .option('--json', 'Output edges as JSON')
    .option('--verbose', 'Show detailed logging output')
    .action(depsCommand);

  program
    .command('init <inputDir>')
    .description('Write a default interface-map.config.json')
    .action(initCommand);

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[]): Promise<void> {
  const program = createCLI();
  await program.parseAsync(args, { from: 'node' });
}
