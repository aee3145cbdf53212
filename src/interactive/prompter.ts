/**
 * Readline Prompter
 *
 * Prompts on stdin/stdout (or the streams given) one question at a time.
 * The readline interface is created on first use and released by close().
 */

import * as readline from 'readline';
import type { Prompter, PrompterConfig } from './types';

export const create = (config: PrompterConfig = {}): Prompter => {
    const input = config.input ?? process.stdin;
    const output = config.output ?? process.stdout;
    let rl: readline.Interface | null = null;

    const getInterface = (): readline.Interface => {
        if (!rl) {
            rl = readline.createInterface({ input, output });
        }
        return rl;
    };

    const ask = (question: string): Promise<string> => {
        const iface = getInterface();
        return new Promise((resolve) => {
            iface.question(question, (answer) => {
                resolve(answer.trim());
            });
        });
    };

    const print = (text: string): void => {
        output.write(text + '\n');
    };

    const close = (): void => {
        if (rl) {
            rl.close();
            rl = null;
        }
    };

    return { ask, print, close };
};
