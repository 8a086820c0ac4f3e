import chalk from "chalk";

export interface Logger {
    step(message: string): void;
    done(message: string, startedAt?: number): void;
    detail(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Prints `[scope] message` lines, coloured by kind.
 */
export function createLogger(scope: string, silent = false): Logger {
    const prefix = `[${scope}]`;
    const print = (line: string) => {
        if (!silent) console.log(line);
    };

    return {
        step: (message) => print(chalk.yellow(`${prefix} ${message}`)),
        done: (message, startedAt) => {
            const took =
                startedAt === undefined
                    ? ""
                    : `, took ${((Date.now() - startedAt) / 1000).toFixed(1)}s`;
            print(chalk.green(`${prefix} ${message}${took}`));
        },
        detail: (message) => print(chalk.dim(`${prefix} ${message}`)),
        warn: (message) => print(chalk.magenta(`${prefix} ${message}`)),
        error: (message) => {
            if (!silent) console.error(chalk.red(`${prefix} ${message}`));
        },
    };
}

export const silentLogger: Logger = createLogger("", true);
