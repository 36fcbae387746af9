import { Command } from 'commander';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import boxen from 'boxen';
import { resolveShardConfig, ShardCommandOptions } from '../config';
import { handleError } from '../errors/handler';
import { FileSharder } from '../shard/sharder';
import { saveManifest } from '../shard/manifest';
import { toHex } from '../shard/hasher';
import { DEFAULT_CHUNK_SIZE_MB, MB } from '../types/shard';
import { abortOnShutdown, isShuttingDownFlag, waitOnShutdown } from '../utils/shutdown';
import { isVerbose, isQuiet, outputResult, formatBytes, formatTime } from '../utils/output';

/**
 * Create the shard command
 */
export function createShardCommand(): Command {
  const cmd = new Command('shard');

  cmd
    .description('Split a file into fixed-size chunks and write its manifest')
    .argument('<input>', 'File to shard')
    .option('-o, --output-dir <dir>', 'Directory for chunk files and the manifest (default: output)')
    .option('-c, --chunk-size <mb>', `Chunk size in MB (default: ${DEFAULT_CHUNK_SIZE_MB})`)
    .option('--concurrency <n>', 'Number of chunks processed in parallel')
    .action(async (input: string, options: ShardCommandOptions) => {
      const startTime = Date.now();

      try {
        const config = resolveShardConfig(input, options);

        if (isVerbose()) {
          console.log(boxen(
            chalk.bold('Shard Details\n\n') +
            `${chalk.cyan('Input:')} ${config.inputPath}\n` +
            `${chalk.cyan('Output:')} ${config.outputDir}\n` +
            `${chalk.cyan('Chunk size:')} ${formatBytes(config.chunkSizeBytes)} (${config.chunkSizeBytes / MB} MB)\n` +
            `${chalk.cyan('Workers:')} ${config.concurrency}`,
            {
              padding: 1,
              borderColor: 'blue',
              borderStyle: 'round',
              margin: { top: 1, right: 0, bottom: 1, left: 0 },
            }
          ));
        }

        const controller = new AbortController();
        const progress: { spinner?: Ora } = {};
        const onProgress = (completed: number, total: number) => {
          if (isShuttingDownFlag() || !isVerbose()) return;

          const message = chalk.cyan('Sharding: ') + `${completed}/${total} chunks`;
          if (!progress.spinner) {
            progress.spinner = ora(message).start();
          } else {
            progress.spinner.text = message;
          }
        };

        const sharding = new FileSharder().shard(config, { signal: controller.signal, onProgress });
        abortOnShutdown(controller, sharding);

        const manifest = await sharding;
        const saving = saveManifest(manifest, config.outputDir);
        waitOnShutdown(saving);
        const manifestPath = await saving;

        progress.spinner?.succeed(chalk.green('Sharding complete'));

        if (isVerbose()) {
          const elapsedTime = (Date.now() - startTime) / 1000;
          console.log(chalk.green.bold('\n✓ Sharding successful!\n'));
          console.log(chalk.dim('Details:'));
          console.log(`  ${chalk.cyan('Original file:')} ${manifest.originalFile}`);
          console.log(`  ${chalk.cyan('Total size:')} ${manifest.totalSize} bytes`);
          console.log(`  ${chalk.cyan('Chunks:')} ${manifest.chunkCount}`);
          console.log(`  ${chalk.cyan('Manifest:')} ${manifestPath}`);
          console.log(`  ${chalk.cyan('CID:')} ${manifest.cid}`);
          console.log(`  ${chalk.cyan('Duration:')} ${formatTime(elapsedTime)}`);
          for (const chunk of manifest.chunks) {
            console.log(chalk.dim(`    ${chunk.index}: ${chunk.filename} (${chunk.size} bytes, sha256: ${toHex(chunk.digest).slice(0, 8)}...)`));
          }
        } else if (!isQuiet()) {
          outputResult(manifest.cid);
        }
      } catch (error) {
        handleError(error, process.env.DEBUG === 'true');
        process.exit(1);
      }
    });

  return cmd;
}
