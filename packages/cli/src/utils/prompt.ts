import { createInterface } from 'node:readline';

/**
 * Ask the user to confirm an action.
 *
 * `yes` skips the prompt. Without a TTY the answer is no.
 */
export async function confirm(message: string, options: { yes?: boolean }): Promise<boolean> {
    if (options.yes) return true;

    if (!process.stdin.isTTY) {
        console.error('Non-interactive mode. Use --yes to confirm.');
        return false;
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout });

    return new Promise((resolve) => {
        rl.question(`${message} [y/N] `, (answer) => {
            rl.close();
            resolve(answer.trim().toLowerCase() === 'y');
        });
    });
}
