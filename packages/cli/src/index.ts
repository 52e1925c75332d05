#!/usr/bin/env node
import { createRequire } from 'module';
import { Command } from 'commander';
import { applyDotEnv } from './utils/env.js';
import { handleDownloadCommand, type DownloadCommandOptionsInput } from './cli/commands/index.js';
import { describeFatalError } from './cli/utils/errors.js';

// Use createRequire to import package.json without experimental warning
const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');
const version =
    typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
        ? pkg.version
        : '0.0.0';

// `.env` values take part in `$VAR` expansion of config paths
applyDotEnv();

const program = new Command();

program
    .name('neurobik')
    .description('Download local models and OCI images, tracking completion on disk')
    .version(version, '-v, --version', 'output the current version');

program
    .command('download', { isDefault: true })
    .description('Select pending models and images and download them')
    .requiredOption('-c, --config <path>', 'path to the YAML config file')
    .option('-a, --all', 'download every pending item without prompting', false)
    .option('--log-level <level>', 'log level: debug, info, warn, error, silly')
    .option('--log-file <path>', 'log file path (default: ./neurobik.log)')
    .action(async (options: DownloadCommandOptionsInput) => {
        try {
            process.exitCode = await handleDownloadCommand(options);
        } catch (error) {
            for (const line of describeFatalError(error)) {
                console.error(line);
            }
            process.exitCode = 1;
        }
    });

await program.parseAsync(process.argv);
