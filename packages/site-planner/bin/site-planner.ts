#!/usr/bin/env tsx
/**
 * Site Planner CLI Entry Point
 *
 * Scores hex cells, credits Tier A coverage against Tier B sites and writes
 * the per-zone rollups.
 *
 * @module site-planner-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { ConfigError, loadConfig, type CLIConfig } from '../src/cli/lib/config.js';
import { createCLILogger, type CLILogger } from '../src/cli/lib/logger.js';
import type { PlanningCommandResult } from '../src/cli/lib/layers.js';
import { adjacencyCommand } from '../src/cli/commands/adjacency.js';
import { runCommand } from '../src/cli/commands/run.js';
import { satisfyCommand } from '../src/cli/commands/satisfy.js';
import { scoreCommand } from '../src/cli/commands/score.js';
import { FailureThresholdError, LayerReadError } from '../src/core/errors.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Completed, some records excluded or flagged */
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Global State
// ============================================================================

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  json?: boolean;
  dryRun?: boolean;
  dataDir?: string;
}

export interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  try {
    const result = PackageJsonSchema.safeParse(
      JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'))
    );
    return result.success ? result.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function initializeContext(options: GlobalOptions): GlobalContext {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      dryRun: options.dryRun,
      dataDir: options.dataDir,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  if (config.configPath) {
    logger.debug('Loaded config', { path: config.configPath });
  }

  globalContext = { config, logger, startTime: Date.now() };
  return globalContext;
}

function exitFor(result: PlanningCommandResult): ExitCode {
  return result.issues.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('site-planner')
    .description('Hex-grid site planning: cell scoring, Tier A coverage, zone rollups')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--dry-run', 'Compute and report without writing files')
    .option('--config <path>', 'Path to config file (default: .siteplannerrc)')
    .option('--data-dir <dir>', 'Directory holding the layer files')
    .hook('preAction', (thisCommand) => {
      try {
        initializeContext(thisCommand.opts<GlobalOptions>());
      } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        console.error(`Configuration error: ${error.message}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('score')
    .description('Classify cells and write Tier B targets and Tier C demand')
    .action(async () => {
      const result = await scoreCommand(getGlobalContext());
      process.exitCode = exitFor(result);
    });

  program
    .command('satisfy')
    .description('Mark Tier B required sites covered by Tier A sites as SATISFIED')
    .action(async () => {
      const result = await satisfyCommand(getGlobalContext());
      process.exitCode = exitFor(result);
    });

  program
    .command('run')
    .description('Score cells, then apply Tier A coverage')
    .action(async () => {
      const result = await runCommand(getGlobalContext());
      process.exitCode = exitFor(result);
    });

  program
    .command('adjacency')
    .description('Report neighbour counts for the cell layer')
    .action(async () => {
      const result = await adjacencyCommand(getGlobalContext());
      process.exitCode = exitFor(result);
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

function describeFailure(error: unknown): string {
  if (error instanceof LayerReadError || error instanceof FailureThresholdError) {
    return error.toLogString();
  }
  return error instanceof Error ? error.message : String(error);
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: describeFailure(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      console.error(`Error: ${describeFailure(error)}`);
    }
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
