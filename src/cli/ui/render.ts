import chalk from 'chalk';
import type { EntryPointMapping } from '../../entrypoints/types.js';

/**
 * Render a section heading
 */
export function renderHeading(title: string): void {
    console.log(chalk.bold(`\n${title}\n`));
}

/**
 * Render an entry point mapping grouped by namespace
 */
export function renderMapping(mapping: EntryPointMapping): void {
    const groups = Object.keys(mapping).sort();
    if (groups.length === 0) {
        console.log(chalk.dim('  No plugins found.'));
        return;
    }

    for (const group of groups) {
        console.log(chalk.cyan.bold(`  [${group}]`));
        for (const line of [...mapping[group]].sort()) {
            const eq = line.indexOf('=');
            console.log(`    ${chalk.white(line.slice(0, eq))} ${chalk.dim('=')} ${line.slice(eq + 1)}`);
        }
    }
    console.log();
}

/**
 * Number of entry points in a mapping
 */
export function countEntryPoints(mapping: EntryPointMapping): number {
    return Object.values(mapping).reduce((sum, lines) => sum + lines.length, 0);
}

/**
 * Render an error result
 */
export function renderError(message: string): void {
    console.error(chalk.red.bold(`✗ ${message}`));
}
