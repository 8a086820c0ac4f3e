import chalk from "chalk";
import { exitCodeOf, messageOf, nameOf } from "@keelson/core";

/**
 * Runs a command and ends the process with its exit code; errors are
 * printed in red and exit with the code of their kind.
 */
export async function exitWith(
    task: () => Promise<number | void>,
    exit: (code: number) => void = (code) => process.exit(code),
): Promise<void> {
    let code: number;
    try {
        code = (await task()) ?? 0;
    } catch (e) {
        console.error(chalk.red(`${nameOf(e)}: `) + messageOf(e) + "\n");
        code = exitCodeOf(e);
    }
    exit(code);
}
