import { Command } from 'commander';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import * as path from 'path';
import { resolveReassembleConfig, ReassembleCommandOptions } from '../config';
import { handleError } from '../errors/handler';
import { loadManifest } from '../shard/manifest';
import { Reassembler } from '../shard/reassembler';
import { DirectoryChunkSource } from '../storage/local';
import { validateLocalName } from '../utils/validation';
import { abortOnShutdown, isShuttingDownFlag } from '../utils/shutdown';
import { isVerbose, isQuiet, verboseLog, outputResult, formatBytes, formatTime } from '../utils/output';

/**
 * Create the reassemble command
 */
export function createReassembleCommand(): Command {
  return new Command('reassemble')
    .description('Rebuild a file from its manifest and chunk files, verifying every chunk')
    .argument('<manifest>', 'Path to a <name>_metadata.json manifest')
    .option('-o, --output-dir <dir>', 'Directory for the rebuilt file (default: output)')
    .option('--chunks-dir <dir>', 'Directory holding the chunk files (default: the manifest directory)')
    .option('--name <filename>', 'File name for the rebuilt file (default: the original name)')
    .option('--concurrency <n>', 'Number of chunks verified ahead of the writer')
    .action(reassembleCommand);
}

async function reassembleCommand(manifestArg: string, options: ReassembleCommandOptions) {
  const startTime = Date.now();

  try {
    const config = resolveReassembleConfig(manifestArg, options);

    // Manifest is fully validated before any chunk is touched
    const manifest = await loadManifest(config.manifestPath);
    const outputName = config.outputName ?? manifest.originalFile;
    validateLocalName(outputName);
    const outputPath = path.join(config.outputDir, outputName);

    verboseLog(chalk.bold(`\nReassembling: ${manifest.originalFile}`));
    verboseLog(`  ${chalk.cyan('Expected size:')} ${manifest.totalSize} bytes (${formatBytes(manifest.totalSize)})`);
    verboseLog(`  ${chalk.cyan('Chunks:')} ${manifest.chunkCount} from ${config.chunksDir}`);

    const controller = new AbortController();
    const progress: { spinner?: Ora } = {};
    const onProgress = (written: number, total: number) => {
      if (isShuttingDownFlag() || !isVerbose()) return;

      const percent = total === 0 ? 100 : Math.floor((written / total) * 100);
      const message = chalk.cyan('Writing: ') + `${percent}% (${formatBytes(written)}/${formatBytes(total)})`;
      if (!progress.spinner) {
        progress.spinner = ora(message).start();
      } else {
        progress.spinner.text = message;
      }
    };

    const reassembler = new Reassembler(new DirectoryChunkSource(config.chunksDir));
    const reassembly = reassembler.reassemble(manifest, outputPath, {
      concurrency: config.concurrency,
      signal: controller.signal,
      onProgress,
    });
    abortOnShutdown(controller, reassembly);

    const result = await reassembly;
    progress.spinner?.succeed(chalk.green('All chunks verified'));

    if (isVerbose()) {
      const elapsedTime = (Date.now() - startTime) / 1000;
      console.log(chalk.green.bold('\n✓ File reassembled successfully!\n'));
      console.log(`  ${chalk.cyan('Output:')} ${result.outputPath}`);
      console.log(`  ${chalk.cyan('Size:')} ${result.size} bytes`);
      console.log(`  ${chalk.cyan('CID:')} ${manifest.cid}`);
      console.log(`  ${chalk.cyan('Duration:')} ${formatTime(elapsedTime)}`);
    } else if (!isQuiet()) {
      outputResult(result.outputPath);
    }
  } catch (error) {
    handleError(error, process.env.DEBUG === 'true');
    process.exit(1);
  }
}
