import { Command, Option } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { PackagePathPluginFinder } from '../../finders/scanner.js';
import { PluginIndexBuilder, type BuiltIndex, type IndexFormat } from '../../finders/index-builder.js';
import type { WaypostConfig } from '../../config/schema.js';
import { loadProjectContext } from '../context.js';
import { Spinner } from '../ui/spinner.js';
import { countEntryPoints } from '../ui/render.js';
import { writeFile, mkdir } from 'node:fs/promises';

interface DiscoverOptions {
    path?: string;
    include?: string[];
    exclude?: string[];
    format: string;
    output?: string;
}

/**
 * Finder over the package directory configured for a project
 */
export function createPackageFinder(config: WaypostConfig, workDir: string): PackagePathPluginFinder {
    return new PackagePathPluginFinder({
        path: path.resolve(workDir, config.path),
        include: config.include,
        exclude: config.exclude,
    });
}

/**
 * Scan with a spinner on stderr
 */
export async function buildIndex(config: WaypostConfig, workDir: string, format: IndexFormat): Promise<BuiltIndex> {
    const spinner = new Spinner();
    spinner.start(`Scanning ${config.path} for plugins...`);
    try {
        const built = await new PluginIndexBuilder(createPackageFinder(config, workDir)).build(format);
        spinner.success(`Found ${countEntryPoints(built.mapping)} plugins`);
        return built;
    } catch (err) {
        spinner.fail('Plugin discovery failed');
        throw err;
    }
}

export function createDiscoverCommand(): Command {
    return new Command('discover')
        .description('Scan a package for plugins and print their entry points')
        .option('-p, --path <dir>', 'Directory to scan')
        .option('-e, --exclude <glob...>', 'Globs of modules to skip')
        .option('-i, --include <glob...>', 'Globs of modules to scan')
        .addOption(new Option('-f, --format <format>', 'Output format').choices(['json', 'ini']).default('json'))
        .option('-o, --output <file>', 'Write the result to a file instead of stdout')
        .action(async (options: DiscoverOptions, command: Command) => {
            const { workDir, config } = await loadProjectContext(command, {
                path: options.path,
                include: options.include,
                exclude: options.exclude,
            });
            const format: IndexFormat = options.format === 'ini' ? 'ini' : 'json';

            const built = await buildIndex(config, workDir, format);

            if (options.output) {
                const target = path.resolve(workDir, options.output);
                await mkdir(path.dirname(target), { recursive: true });
                await writeFile(target, built.content, 'utf-8');
                console.log(chalk.green(`✓ Entry points written to ${path.relative(workDir, target)}`));
                return;
            }

            process.stdout.write(built.content);
        });
}
