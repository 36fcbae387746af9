import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import { handleError } from '../errors/handler';
import { loadManifest } from '../shard/manifest';
import { Reassembler } from '../shard/reassembler';
import { DirectoryChunkSource } from '../storage/local';
import { isVerbose, isQuiet, outputResult } from '../utils/output';

/**
 * Create the verify command
 */
export function createVerifyCommand(): Command {
  const verify = new Command('verify');

  verify
    .description('Check chunk files against a manifest without writing anything')
    .argument('<manifest>', 'Path to a <name>_metadata.json manifest')
    .option('--chunks-dir <dir>', 'Directory holding the chunk files (default: the manifest directory)')
    .action(async (manifestPath: string, options: { chunksDir?: string }) => {
      try {
        const manifest = await loadManifest(manifestPath);
        const chunksDir = options.chunksDir ?? path.dirname(manifestPath);

        const spinner = isVerbose() ? ora(`Verifying ${manifest.chunkCount} chunk(s)...`).start() : null;
        const result = await new Reassembler(new DirectoryChunkSource(chunksDir)).verify(manifest);
        spinner?.succeed(chalk.green('Chunk set verified'));

        if (isVerbose()) {
          console.log(`  ${chalk.cyan('Chunks:')} ${result.chunksVerified}`);
          console.log(`  ${chalk.cyan('Size:')} ${result.totalSize} bytes`);
          console.log(`  ${chalk.cyan('CID:')} ${manifest.cid}`);
        } else if (!isQuiet()) {
          outputResult(JSON.stringify({
            cid: manifest.cid,
            chunks: result.chunksVerified,
            size: result.totalSize,
            ok: true,
          }));
        }
      } catch (error) {
        handleError(error, process.env.DEBUG === 'true');
        process.exit(1);
      }
    });

  return verify;
}
