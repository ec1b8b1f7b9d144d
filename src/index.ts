#!/usr/bin/env node
/**
 * interface-map - Entry Point
 *
 * Usage:
 *   interface-map map ./Assets/Scripts              # Write reports to ./Assets/Scripts/_interface_maps
 *   interface-map map ./Assets/Scripts ./docs/api   # Write reports to ./docs/api
 *   interface-map deps ./Assets/Scripts             # Print the dependency graph
 *   interface-map init ./Assets/Scripts             # Write a default config file
 *   interface-map --help                            # Show help
 */

import { runCLI } from './cli/commands.js';
import { getLogger } from './utils/logger.js';

function reportCrash(error: unknown): void {
  const message = error instanceof Error ? `${error.message}\n${error.stack ?? ''}` : String(error);
  getLogger().error('startup', `Unexpected failure: ${message}`);
  console.error('interface-map failed:', error);
}

process.on('unhandledRejection', (reason) => {
  reportCrash(reason);
  process.exit(1);
});

runCLI(process.argv).catch((error: unknown) => {
  reportCrash(error);
  process.exit(1);
});
