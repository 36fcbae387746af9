import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import { ConfigError } from '../errors/types';
import { handleError } from '../errors/handler';
import { loadManifest } from '../shard/manifest';
import { DirectoryChunkSource, LocalDirectoryBackend } from '../storage/local';
import { publishShardSet } from '../storage/publisher';
import { isVerbose, isQuiet, outputResult } from '../utils/output';
import { abortOnShutdown } from '../utils/shutdown';

interface PublishCommandOptions {
  chunksDir?: string;
  retries: string;
}

/**
 * Create the publish command
 */
export function createPublishCommand(): Command {
  return new Command('publish')
    .description('Copy a chunk set and its manifest to a storage directory')
    .argument('<manifest>', 'Path to a <name>_metadata.json manifest')
    .argument('<target-dir>', 'Directory the chunk set is stored in')
    .option('--chunks-dir <dir>', 'Directory holding the chunk files (default: the manifest directory)')
    .option('--retries <n>', 'Retries per blob on recoverable failures', '3')
    .action(publishCommand);
}

async function publishCommand(manifestPath: string, targetDir: string, options: PublishCommandOptions) {
  try {
    const maxRetries = Number(options.retries);
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new ConfigError(`Retries must be a non-negative integer, got "${options.retries}"`);
    }

    const manifest = await loadManifest(manifestPath);
    const source = new DirectoryChunkSource(options.chunksDir ?? path.dirname(manifestPath));
    const backend = new LocalDirectoryBackend(targetDir);

    const spinner = isVerbose() ? ora(`Publishing to ${backend.name} backend...`).start() : null;
    const controller = new AbortController();
    const publishing = publishShardSet(manifest, source, backend, {
      retry: { maxRetries },
      signal: controller.signal,
      onProgress: (published, total) => {
        if (spinner) {
          spinner.text = `Publishing chunks: ${published}/${total}`;
        }
      },
    });
    abortOnShutdown(controller, publishing);

    const result = await publishing;
    spinner?.succeed(chalk.green('Chunk set published'));

    if (isVerbose()) {
      for (const receipt of result.receipts) {
        console.log(chalk.dim(`  ${receipt.name} → ${receipt.location}`));
      }
      console.log(`  ${chalk.cyan('Manifest:')} ${result.manifestReceipt.location}`);
    } else if (!isQuiet()) {
      outputResult(result.manifestReceipt.location);
    }
  } catch (error) {
    handleError(error, process.env.DEBUG === 'true');
    process.exit(1);
  }
}
