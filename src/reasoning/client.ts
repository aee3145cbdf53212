/**
 * Reasoning Client
 *
 * Wrapper for chat completion calls against an OpenAI-compatible endpoint,
 * with tool/function calling support. The endpoint, key and model come from
 * the config passed in; nothing is shared between instances.
 */

import OpenAI from 'openai';
import type {
    ConversationMessage,
    ReasoningConfig,
    ReasoningRequest,
    ReasoningResponse,
    ToolCall,
} from './types';
import { ReasoningError } from './types';
import * as Logging from '../logging';
import { DEFAULT_LOCAL_API_KEY, DEFAULT_TEMPERATURE } from '../constants';

export interface ClientInstance {
    complete(request: ReasoningRequest): Promise<ReasoningResponse>;
    readonly model: string;
}

const toOpenAIMessage = (message: ConversationMessage): OpenAI.Chat.ChatCompletionMessageParam => {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'user':
            return { role: 'user', content: message.content };
        case 'tool':
            return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
        case 'assistant':
            if (message.toolCalls && message.toolCalls.length > 0) {
                return {
                    role: 'assistant',
                    content: message.content,
                    tool_calls: message.toolCalls.map(tc => ({
                        id: tc.id,
                        type: 'function' as const,
                        function: { name: tc.name, arguments: JSON.stringify(tc.arguments) },
                    })),
                };
            }
            return { role: 'assistant', content: message.content };
    }
};

const parseArguments = (raw: string): Record<string, unknown> => {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ReasoningError(`Tool call arguments are not valid JSON: ${raw}`, { cause: error });
    }
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
        throw new ReasoningError(`Tool call arguments must be a JSON object: ${raw}`);
    }
    return Object.fromEntries(Object.entries(parsed));
};

export const create = (config: ReasoningConfig): ClientInstance => {
    const logger = Logging.getLogger();

    // Lazy-initialize OpenAI client (only when actually needed)
    let client: OpenAI | null = null;
    const getClient = (): OpenAI => {
        if (!client) {
            client = new OpenAI({
                apiKey: config.apiKey ?? DEFAULT_LOCAL_API_KEY,
                baseURL: config.baseUrl,
            });
        }
        return client;
    };

    const complete = async (request: ReasoningRequest): Promise<ReasoningResponse> => {
        const startTime = Date.now();
        logger.debug('Reasoning request starting', { model: config.model, messages: request.messages.length });

        const tools: OpenAI.Chat.ChatCompletionTool[] | undefined = request.tools?.map(tool => ({
            type: 'function' as const,
            function: {
                name: tool.name,
                description: tool.description,
                parameters: tool.parameters,
            },
        }));

        // No limit configured means none is sent and the backend decides
        const maxTokens = request.maxTokens ?? config.maxTokens;
        const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
            model: config.model,
            messages: request.messages.map(toOpenAIMessage),
            temperature: request.temperature ?? config.temperature ?? DEFAULT_TEMPERATURE,
            ...(maxTokens !== undefined ? { max_tokens: maxTokens } : {}),
            ...(request.json ? { response_format: { type: 'json_object' as const } } : {}),
            ...(tools && tools.length > 0 ? { tools, tool_choice: 'auto' as const } : {}),
        };

        let response: OpenAI.Chat.ChatCompletion;
        try {
            response = await getClient().chat.completions.create(params);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error('Completion request to %s failed: %s', config.model, message);
            throw new ReasoningError(`Failed to create completion: ${message}`, { cause: error });
        }

        const duration = Date.now() - startTime;
        logger.verbose('Model %s responded in %dms', config.model, duration);

        const choice = response.choices[0];
        if (!choice) {
            throw new ReasoningError('No choices received from the completion backend');
        }
        const message = choice.message;

        const toolCalls: ToolCall[] | undefined = message.tool_calls?.map(tc => ({
            id: tc.id,
            name: tc.function.name,
            arguments: parseArguments(tc.function.arguments),
        }));

        if (toolCalls && toolCalls.length > 0) {
            logger.debug('Model requested %d tool calls: %s', toolCalls.length, toolCalls.map(t => t.name).join(', '));
        }

        return {
            content: message.content?.trim() ?? '',
            model: response.model,
            toolCalls: toolCalls && toolCalls.length > 0 ? toolCalls : undefined,
            usage: response.usage ? {
                promptTokens: response.usage.prompt_tokens,
                completionTokens: response.usage.completion_tokens,
                totalTokens: response.usage.total_tokens,
            } : undefined,
        };
    };

    return {
        complete,
        model: config.model,
    };
};
