import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { handleError } from '../errors/handler';
import { loadManifest } from '../shard/manifest';
import { parseIdentifier } from '../shard/identifier';
import { merkleRoot } from '../shard/merkle';
import { toHex } from '../shard/hasher';
import { formatBytes, isVerbose, isQuiet, outputResult } from '../utils/output';

/**
 * Create info command
 * Show the contents of a shard manifest
 */
export function createInfoCommand(): Command {
  const info = new Command('info');

  info
    .description('Show the contents of a shard manifest')
    .argument('<manifest>', 'Path to a <name>_metadata.json manifest')
    .action(async (manifestPath: string) => {
      try {
        const manifest = await loadManifest(manifestPath);
        const identifier = parseIdentifier(manifest.cid);
        const root = merkleRoot(manifest.chunks.map((chunk) => chunk.digest));

        if (isVerbose()) {
          console.log(chalk.bold(`\nManifest: ${manifestPath}\n`));
          console.log(`  ${chalk.cyan('File:')}        ${manifest.originalFile}`);
          console.log(`  ${chalk.cyan('Size:')}        ${manifest.totalSize} bytes (${formatBytes(manifest.totalSize)})`);
          console.log(`  ${chalk.cyan('Chunk size:')}  ${formatBytes(manifest.chunkSize)}`);
          console.log(`  ${chalk.cyan('Chunks:')}      ${manifest.chunkCount}`);
          console.log(`  ${chalk.cyan('CID:')}         ${manifest.cid}`);
          console.log(`  ${chalk.cyan('Codec:')}       raw (0x${identifier.codec.toString(16)}), sha2-256 (0x${identifier.hashCode.toString(16)})`);
          console.log(`  ${chalk.cyan('Merkle root:')} ${root ? toHex(root) : chalk.dim('-')}`);

          if (manifest.chunks.length > 0) {
            const table = new Table({
              head: [
                chalk.cyan('#'),
                chalk.cyan('File'),
                chalk.cyan('Size'),
                chalk.cyan('SHA-256'),
              ],
              style: {
                head: [],
                border: ['dim'],
              },
            });

            for (const chunk of manifest.chunks) {
              table.push([String(chunk.index), chunk.filename, formatBytes(chunk.size), toHex(chunk.digest)]);
            }

            console.log(`\n${table.toString()}`);
          }
        } else if (!isQuiet()) {
          outputResult(JSON.stringify({
            file: manifest.originalFile,
            size: manifest.totalSize,
            chunkSize: manifest.chunkSize,
            chunks: manifest.chunkCount,
            cid: manifest.cid,
            merkleRoot: root ? toHex(root) : null,
          }));
        }
      } catch (error) {
        handleError(error, process.env.DEBUG === 'true');
        process.exit(1);
      }
    });

  return info;
}
