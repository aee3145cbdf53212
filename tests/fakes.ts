/**
 * Shared test doubles: a scripted console and a canned completion backend.
 */

import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { Prompter } from '../src/interactive';
import type { ReasoningInstance, ReasoningRequest, ReasoningResponse } from '../src/reasoning';

export interface ScriptedPrompter extends Prompter {
    questions: string[];
    printed: string[];
    closed: boolean;
}

/**
 * Answers questions from a fixed list, in order. Running out of answers is a
 * test bug, so it throws.
 */
export const createScriptedPrompter = (answers: string[]): ScriptedPrompter => {
    const queue = [...answers];
    const prompter: ScriptedPrompter = {
        questions: [],
        printed: [],
        closed: false,
        ask: async (question: string) => {
            prompter.questions.push(question);
            const answer = queue.shift();
            if (answer === undefined) {
                throw new Error(`No scripted answer left for: ${question}`);
            }
            return answer;
        },
        print: (text: string) => {
            prompter.printed.push(text);
        },
        close: () => {
            prompter.closed = true;
        },
    };
    return prompter;
};

export type CannedReply = Partial<ReasoningResponse> | Error;

export interface FakeReasoning extends ReasoningInstance {
    complete: Mock<(request: ReasoningRequest) => Promise<ReasoningResponse>>;
}

/**
 * A backend that hands out the given replies in order. Error entries reject.
 */
export const createFakeReasoning = (replies: CannedReply[]): FakeReasoning => {
    const queue = [...replies];
    const complete = vi.fn(async (_request: ReasoningRequest): Promise<ReasoningResponse> => {
        const reply = queue.shift();
        if (reply === undefined) {
            throw new Error('No canned reply left');
        }
        if (reply instanceof Error) {
            throw reply;
        }
        return { content: '', model: 'test-model', ...reply };
    });
    return { complete, model: 'test-model' };
};
