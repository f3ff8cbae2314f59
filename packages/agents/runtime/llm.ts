import { generateObject, generateText, NoObjectGeneratedError, type CoreMessage, type LanguageModel } from 'ai';
import type { z } from 'zod';
import { addLog } from '@insight/shared/logger';

export type ChatMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string };

/**
 * Outcome of a schema-constrained completion. Transport errors and schema
 * mismatches both land in the failure variant.
 */
export type StructuredResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: string };

export interface CompletionOptions {
    signal?: AbortSignal;
}

export interface StructuredCompletionOptions extends CompletionOptions {
    /** Name of the expected object, forwarded to the model as a hint. */
    schemaName?: string;
}

export interface LlmClient {
    complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
    completeStructured<T>(
        messages: ChatMessage[],
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        options?: StructuredCompletionOptions
    ): Promise<StructuredResult<T>>;
}

export interface AiSdkLlmClientSettings {
    temperature?: number;
    maxTokens?: number;
}

const toCoreMessages = (messages: ChatMessage[]): CoreMessage[] =>
    messages.map(message =>
        message.role === 'system'
            ? { role: 'system', content: message.content }
            : { role: 'user', content: message.content }
    );

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

/**
 * LlmClient backed by the AI SDK (generateText / generateObject).
 */
export class AiSdkLlmClient implements LlmClient {
    constructor(
        private readonly model: LanguageModel,
        private readonly settings: AiSdkLlmClientSettings = {}
    ) {}

    async complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
        const { text } = await generateText({
            model: this.model,
            messages: toCoreMessages(messages),
            temperature: this.settings.temperature,
            maxTokens: this.settings.maxTokens,
            abortSignal: options?.signal,
        });
        return text;
    }

    async completeStructured<T>(
        messages: ChatMessage[],
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        options?: StructuredCompletionOptions
    ): Promise<StructuredResult<T>> {
        try {
            const { object } = await generateObject({
                model: this.model,
                schema,
                schemaName: options?.schemaName,
                messages: toCoreMessages(messages),
                temperature: this.settings.temperature,
                maxTokens: this.settings.maxTokens,
                abortSignal: options?.signal,
            });
            return { ok: true, value: object };
        } catch (error) {
            const label = options?.schemaName ?? 'object';
            if (NoObjectGeneratedError.isInstance(error)) {
                addLog(`[LLM] ${label}: response did not match schema: ${error.message}`);
                return { ok: false, error: `response did not match schema (${error.message})` };
            }
            addLog(`[LLM] ${label}: request failed: ${describeError(error)}`);
            return { ok: false, error: `request failed (${describeError(error)})` };
        }
    }
}
