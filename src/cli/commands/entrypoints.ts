import { Command } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { writeFile } from 'node:fs/promises';
import { loadProjectContext } from '../context.js';
import { buildIndex } from './discover.js';
import { renderHeading, renderMapping } from '../ui/render.js';

export function createEntrypointsCommand(): Command {
    return new Command('entrypoints')
        .description('Regenerate the entry points file of the project')
        .option('-e, --exclude <glob...>', 'Globs of modules to skip')
        .option('-i, --include <glob...>', 'Globs of modules to scan')
        .action(async (options: { include?: string[]; exclude?: string[] }, command: Command) => {
            const { workDir, config } = await loadProjectContext(command, {
                include: options.include,
                exclude: options.exclude,
            });

            const built = await buildIndex(config, workDir, 'ini');
            const target = path.join(workDir, config.entrypointStaticFile);
            await writeFile(target, built.content, 'utf-8');

            renderHeading(`🧭 Entry points (${config.entrypointStaticFile})`);
            renderMapping(built.mapping);
            console.log(chalk.green(`✓ Wrote ${path.relative(workDir, target)}`));
        });
}
