/**
 * Interactive Mode Types
 */

/**
 * Line-oriented console access. Everything that talks to the person at the
 * keyboard goes through one of these, so tests can script the answers.
 */
export interface Prompter {
    ask(question: string): Promise<string>;
    print(text: string): void;
    close(): void;
}

export interface PrompterConfig {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}
