#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { version as pkgVersion } from '../package.json';
import { createShardCommand } from './cli/shard';
import { createReassembleCommand } from './cli/reassemble';
import { createVerifyCommand } from './cli/verify';
import { createInfoCommand } from './cli/info';
import { createPublishCommand } from './cli/publish';
import { setupShutdownHandlers } from './utils/shutdown';
import { handleError } from './errors/handler';
import { logger, LogLevel } from './utils/logger';

// Setup graceful shutdown handlers
setupShutdownHandlers();

// Handle unhandled rejections
process.on('unhandledRejection', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

// Handle uncaught exceptions (not covered by setupShutdownHandlers)
process.on('uncaughtException', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

program
  .name('blob-shard')
  .description(
    chalk.blue.bold('Blob Shard') +
    '\n\nSplit large files into verifiable chunk sets with a deterministic content identifier.'
  )
  .version(pkgVersion, '-v, --version', 'Display version')
  .option('-d, --debug', 'Enable debug output')
  .option('--verbose', 'Show detailed output (default is minimal for scripting)')
  .option('-q, --quiet', 'Suppress all non-error output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();

    // Set debug mode
    if (opts.debug) {
      process.env.DEBUG = 'true';
      logger.setLevel(LogLevel.DEBUG);
    }

    // Set verbose mode
    if (opts.verbose) {
      process.env.VERBOSE = 'true';
    }

    // Set quiet mode (takes precedence)
    if (opts.quiet) {
      process.env.QUIET = 'true';
      logger.setLevel(LogLevel.ERROR);
    }
  });

// Add sharding commands
program.addCommand(createShardCommand());
program.addCommand(createReassembleCommand());

// Add manifest commands
program.addCommand(createVerifyCommand());
program.addCommand(createInfoCommand());

// Add storage commands
program.addCommand(createPublishCommand());

// Custom help
program.on('--help', () => {
  console.log('');
  console.log(chalk.bold('Command Groups:'));
  console.log('');
  console.log(`  ${chalk.cyan('Sharding')}   shard, reassemble`);
  console.log(`  ${chalk.cyan('Manifest')}   verify, info`);
  console.log(`  ${chalk.cyan('Storage')}    publish`);
  console.log('');
  console.log(chalk.bold('Environment:'));
  console.log(`  ${chalk.dim('BLOB_SHARD_OUTPUT_DIR')}      default output directory`);
  console.log(`  ${chalk.dim('BLOB_SHARD_CHUNK_SIZE_MB')}   default chunk size in MB`);
  console.log(`  ${chalk.dim('BLOB_SHARD_CONCURRENCY')}     default worker count`);
  console.log('');
  console.log(chalk.bold('Examples:'));
  console.log('  $ blob-shard shard ./scan.glb -o ./out -c 64');
  console.log('  $ blob-shard info ./out/scan_metadata.json');
  console.log('  $ blob-shard verify ./out/scan_metadata.json');
  console.log('  $ blob-shard reassemble ./out/scan_metadata.json -o ./restored');
  console.log('  $ blob-shard publish ./out/scan_metadata.json /mnt/archive/scan');
  console.log('');
  console.log(chalk.dim('For more information on a specific command:'));
  console.log('  $ blob-shard <command> --help');
});

program.parse();
