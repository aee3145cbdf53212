/**
 * Reasoning System Types
 *
 * Configuration and request/response shapes for the chat completion backend.
 */

export interface ReasoningConfig {
    model: string;
    baseUrl?: string;
    apiKey?: string;
    temperature?: number;
    maxTokens?: number;
}

export interface ToolCall {
    id: string;
    name: string;
    arguments: Record<string, unknown>;
}

export interface ToolDefinition {
    name: string;
    description: string;
    parameters: Record<string, unknown>;  // JSON Schema
}

export type ConversationMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
    | { role: 'tool'; content: string; toolCallId: string };

export interface ReasoningRequest {
    messages: ConversationMessage[];
    tools?: ToolDefinition[];
    // Ask the backend for a bare JSON object
    json?: boolean;
    // Per-call overrides of the configured values
    temperature?: number;
    maxTokens?: number;
}

export interface ReasoningResponse {
    content: string;
    model: string;
    usage?: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    toolCalls?: ToolCall[];
}

export class ReasoningError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ReasoningError';
    }
}
