import { Command } from 'commander';
import chalk from 'chalk';
import { loadProjectContext } from '../context.js';
import { renderHeading } from '../ui/render.js';
import { EntryPointsCache } from '../../entrypoints/cache.js';
import { DistributionResolver } from '../../entrypoints/metadata.js';
import { MetadataPluginFinder } from '../../finders/metadata.js';
import { ModuleCodeLoader } from '../../finders/loader.js';
import { MatchingPluginFilter, configurePluginFilter } from '../../plugins/filter.js';
import { PluginManager } from '../../manager/manager.js';
import { defaultSearchPath } from '../../utils/paths.js';

export function createResolveCommand(): Command {
    return new Command('resolve')
        .description('List the plugins installed for a namespace without loading them')
        .requiredOption('-n, --namespace <namespace>', 'Plugin namespace')
        .action(async (options: { namespace: string }, command: Command) => {
            const { workDir, config, loader } = await loadProjectContext(command);
            const { namespace } = options;

            const searchPath = defaultSearchPath(workDir);
            renderHeading('📂 Search path');
            for (const entry of searchPath) {
                console.log(chalk.dim(`  ${entry}`));
            }

            const filter = configurePluginFilter(new MatchingPluginFilter(), config.disabled);
            const finder = new MetadataPluginFinder(namespace, {
                entryPointsResolver: new EntryPointsCache({
                    cacheDir: loader.resolveCacheDir(config),
                    searchPath,
                    fileName: config.entrypointStaticFile,
                }),
                codeLoader: new ModuleCodeLoader(workDir),
                onResolveException: (_namespace, entryPoint, error) => {
                    console.log(chalk.red(`  ✗ ${entryPoint.name} = ${entryPoint.value}: ${error.message}`));
                },
            });
            const manager = new PluginManager(namespace, { finder, filters: [filter] });

            renderHeading(`🔌 Plugins in ${namespace}`);
            const specs = await manager.listPluginSpecs();
            if (specs.length === 0) {
                console.log(chalk.dim('  No plugins found.'));
                return;
            }

            const distributions = new DistributionResolver(searchPath);
            for (const spec of specs) {
                const dist = await distributions.resolve(spec);
                const origin = dist ? chalk.dim(` (${dist.name}${dist.version ? `@${dist.version}` : ''})`) : '';
                const disabled = filter.excludes(spec) ? chalk.yellow(' [disabled]') : '';
                console.log(`  ${chalk.cyan(`${spec.namespace}:${spec.name}`)} = ${spec.locator ?? '?'}${origin}${disabled}`);
            }
            console.log();
        });
}
