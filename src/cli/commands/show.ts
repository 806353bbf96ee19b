import { Command } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { readFile } from 'node:fs/promises';
import { loadProjectContext } from '../context.js';
import { isNotFound } from '../../utils/errors.js';

export function createShowCommand(): Command {
    return new Command('show')
        .description('Print the entry points file of the project')
        .action(async (_options: Record<string, never>, command: Command) => {
            const { workDir, config } = await loadProjectContext(command);
            const file = path.join(workDir, config.entrypointStaticFile);

            let content: string;
            try {
                content = await readFile(file, 'utf-8');
            } catch (err) {
                if (!isNotFound(err)) throw err;
                console.log(chalk.dim(`No entry points file at ${config.entrypointStaticFile}.`));
                console.log(chalk.dim(`Generate it with:\n  ${chalk.white('waypost entrypoints')}`));
                return;
            }

            process.stdout.write(content);
        });
}
