import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Progress spinner on stderr, so that command output on stdout can be piped
 */
export class Spinner {
    private spinner: Ora;

    constructor() {
        this.spinner = ora({
            color: 'cyan',
            spinner: 'dots',
            stream: process.stderr,
            isSilent: !process.stderr.isTTY,
        });
    }

    start(message: string): void {
        this.spinner.start(chalk.dim(message));
    }

    /**
     * Stop with success
     */
    success(message: string): void {
        this.spinner.succeed(chalk.green(message));
    }

    /**
     * Stop with failure
     */
    fail(message: string): void {
        this.spinner.fail(chalk.red(message));
    }
}
