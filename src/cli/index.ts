import { Command } from 'commander';
import path from 'node:path';
import { createDiscoverCommand } from './commands/discover.js';
import { createEntrypointsCommand } from './commands/entrypoints.js';
import { createShowCommand } from './commands/show.js';
import { createResolveCommand } from './commands/resolve.js';
import type { GlobalOptions } from './context.js';
import { VERSION } from '../version.js';

export function createCLI(): Command {
    const program = new Command('waypost')
        .description('Discover, index and inspect plugins of Node.js packages')
        .version(VERSION)
        .option('--workdir <dir>', 'Run as if started in this directory')
        .option('-v, --verbose', 'Log debug output to stderr');

    program.hook('preAction', () => {
        const { workdir } = program.opts<GlobalOptions>();
        if (workdir) {
            process.chdir(path.resolve(workdir));
        }
    });

    program.addCommand(createDiscoverCommand());
    program.addCommand(createEntrypointsCommand());
    program.addCommand(createShowCommand());
    program.addCommand(createResolveCommand());

    return program;
}
