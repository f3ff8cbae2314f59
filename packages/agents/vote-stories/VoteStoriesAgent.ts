import { z } from 'zod';
import { addLog } from '@insight/shared/logger';
import type { LlmClient } from '../runtime/llm.js';
import type { PromptLibrary } from '../runtime/promptLoader.js';
import { startAgentRun } from '../runtime/startRun.js';
import type { AgentStartContext, AgentStartSinks, ExecutionHandle, RunnableAgent } from '../runtime/types.js';

export const VOTE_STORIES_AGENT_ID = 'vote-stories';
export const DEFAULT_VOTE_ARGUMENTS = ['However, the tradeoff between UX and security is a concern.'];
export const VOTE_TIMEOUT_MS = 30_000;

const VOTE_INSTRUCTIONS = 'You are a helpful assistant that will vote on a agile user story.';

export const VoteSchema = z.object({
    score: z.number().int().min(0).max(5).describe('0 (WEAK) to 5 (GOOD)'),
    rationale: z.string(),
});

export interface VoteResult {
    story: string;
    arguments: string[];
    score: number | null;
    rationale: string;
    error?: string;
}

export interface VoteStoriesAgentOptions {
    llm: LlmClient;
    prompts: PromptLibrary;
    timeoutMs?: number;
}

const VoteParametersSchema = z.object({
    arguments: z.array(z.string().min(1)).optional(),
});

export class VoteStoriesAgent implements RunnableAgent {
    readonly id = VOTE_STORIES_AGENT_ID;
    readonly description = 'Vote Stories - scores a user story from 0 (weak) to 5 (good)';

    private readonly llm: LlmClient;
    private readonly prompts: PromptLibrary;
    private readonly timeoutMs: number;

    constructor(options: VoteStoriesAgentOptions) {
        this.llm = options.llm;
        this.prompts = options.prompts.require(['vote-stories']);
        this.timeoutMs = options.timeoutMs ?? VOTE_TIMEOUT_MS;
    }

    start(userInput: string, context: AgentStartContext, sinks: AgentStartSinks): ExecutionHandle {
        return startAgentRun(this.id, context, sinks, async ({ signal }) => {
            const params = VoteParametersSchema.parse(context.parameters ?? {});
            const result = await this.analyze(userInput.trim(), params.arguments, signal);
            if (result.error) {
                throw new Error(result.error);
            }
            return renderVoteResult(result);
        });
    }

    /**
     * Never rejects: failures come back in `error` with a null score.
     */
    async analyze(story: string, args: string[] = DEFAULT_VOTE_ARGUMENTS, signal?: AbortSignal): Promise<VoteResult> {
        const argumentsUsed = args.length > 0 ? [...args] : [...DEFAULT_VOTE_ARGUMENTS];
        const prompt = this.prompts.render('vote-stories', {
            story,
            arguments: argumentsUsed.map(argument => `- ${argument}`).join('\n'),
        });

        const timeout = AbortSignal.timeout(this.timeoutMs);
        const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

        const failed = (error: string): VoteResult => {
            addLog(`[VoteStories] ${error}`);
            return { story, arguments: argumentsUsed, score: null, rationale: '', error };
        };

        const result = await this.llm.completeStructured(
            [
                { role: 'system', content: VOTE_INSTRUCTIONS },
                { role: 'user', content: prompt },
            ],
            VoteSchema,
            { schemaName: 'vote', signal: combined }
        );

        if (timeout.aborted) {
            return failed(`Request timed out after ${this.timeoutMs / 1000} seconds. The API might be slow or unresponsive.`);
        }
        if (!result.ok) {
            return failed(`Error during analysis: ${result.error}`);
        }
        return { story, arguments: argumentsUsed, score: result.value.score, rationale: result.value.rationale };
    }
}

export function renderVoteResult(result: VoteResult): string {
    const lines = [`Story: ${result.story}`, 'Arguments:', ...result.arguments.map(argument => `  - ${argument}`)];
    if (result.error) {
        lines.push(`Error: ${result.error}`);
    } else {
        lines.push(`Score: ${result.score ?? '-'}/5`);
        lines.push(`Rationale: ${result.rationale}`);
    }
    return lines.join('\n');
}
