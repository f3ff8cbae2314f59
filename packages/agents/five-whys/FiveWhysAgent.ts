/**
 * FiveWhysAgent - root-cause analysis controller
 *
 * Runs the five-whys graph for one problem statement:
 * entry → why_question → web_search → cause_analysis → validation → decision
 * looping back to why_question until a stop condition fires, then
 * solution_generation → synthesis. A failed cause analysis detours through
 * error_handling, which retries it or ends the run.
 *
 * Each analyze() call owns a fresh state; the instance only holds collaborators.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { AgentProgressPayload } from '@insight/core';
import { addLog } from '@insight/shared/logger';
import type { RunLogger } from '@insight/shared/run-logger';
import { RunAbortedError } from '../runtime/errors.js';
import { describeError, type LlmClient } from '../runtime/llm.js';
import type { PromptLibrary } from '../runtime/promptLoader.js';
import type { SearchClient } from '../runtime/search.js';
import { startAgentRun } from '../runtime/startRun.js';
import type { AgentStartContext, AgentStartSinks, ExecutionHandle, RunnableAgent } from '../runtime/types.js';
import { DEFAULT_MAX_WHY_LEVELS, type FiveWhysConfig } from './config.js';
import { END, nextNode, START_NODE, type FiveWhysNode, type GraphTarget } from './graph.js';
import { FIVE_WHYS_NODE_HANDLERS, type FiveWhysNodeContext } from './nodes.js';
import { FIVE_WHYS_PROMPTS } from './prompts.js';
import { renderFiveWhysResult } from './render.js';
import { createInitialState, elapsedSeconds, type FiveWhysState, type StopReason, type WhyChainEntry } from './state.js';

export const FIVE_WHYS_AGENT_ID = 'five-whys';
const FIVE_WHYS_DESCRIPTION = 'Five Whys - iterative root-cause analysis with web research';

export interface FiveWhysResult {
    problem: string;
    rootCause: string;
    whyChain: WhyChainEntry[];
    solutions: string[];
    report: string;
    processingTime: number;
    stopReason: StopReason | null;
    errors: string[];
}

export interface AnalyzeOptions {
    runId?: string;
    signal?: AbortSignal;
    onProgress?: (progress: AgentProgressPayload) => void;
    /** Called after every node with the state as that node left it. */
    onStepCompleted?: (node: FiveWhysNode, state: Readonly<FiveWhysState>) => void;
}

export interface FiveWhysAgentOptions {
    llm: LlmClient;
    prompts: PromptLibrary;
    config: FiveWhysConfig;
    search?: SearchClient;
    runLogger?: RunLogger;
}

const FiveWhysParametersSchema = z.object({
    maxWhys: z.coerce.number().int().nonnegative().default(DEFAULT_MAX_WHY_LEVELS),
});

export class FiveWhysAgent implements RunnableAgent {
    readonly id = FIVE_WHYS_AGENT_ID;
    readonly description = FIVE_WHYS_DESCRIPTION;

    private readonly llm: LlmClient;
    private readonly prompts: PromptLibrary;
    private readonly config: FiveWhysConfig;
    private readonly search?: SearchClient;
    private readonly runLogger?: RunLogger;

    constructor(options: FiveWhysAgentOptions) {
        this.llm = options.llm;
        this.prompts = options.prompts.require(FIVE_WHYS_PROMPTS);
        this.config = options.config;
        this.search = options.search;
        this.runLogger = options.runLogger;
        if (this.config.webSearch.enabled && !this.search) {
            addLog('[FiveWhys] web search enabled but no search client configured; searches will be empty');
        }
    }

    start(userInput: string, context: AgentStartContext, sinks: AgentStartSinks): ExecutionHandle {
        return startAgentRun(this.id, context, sinks, async ({ runId, signal }) => {
            const { maxWhys } = FiveWhysParametersSchema.parse(context.parameters ?? {});
            const result = await this.analyze(userInput.trim(), maxWhys, {
                runId,
                signal,
                onProgress: progress => {
                    sinks.onEvent?.({ level: 'info', message: `node:${progress.node}` });
                    sinks.onProgress?.(progress);
                },
            });
            for (const error of result.errors) {
                sinks.onEvent?.({ level: 'warning', message: error });
            }
            return renderFiveWhysResult(result);
        });
    }

    async analyze(problem: string, maxWhys: number = DEFAULT_MAX_WHY_LEVELS, options: AnalyzeOptions = {}): Promise<FiveWhysResult> {
        if (!Number.isInteger(maxWhys) || maxWhys < 0) {
            throw new RangeError(`maxWhys must be a non-negative integer, got ${maxWhys}`);
        }

        const runId = options.runId ?? `${this.id}-${randomUUID()}`;
        const state = createInitialState(problem, maxWhys);
        const ctx: FiveWhysNodeContext = {
            llm: this.llm,
            search: this.search,
            prompts: this.prompts,
            config: this.config,
            signal: options.signal,
        };

        addLog(`[FiveWhys] run ${runId} started (maxWhys=${maxWhys})`);
        this.runLogger?.logRunStarted(runId, this.id, problem, { maxWhys, config: this.config });

        try {
            await this.runGraph(state, ctx, runId, options);
        } catch (error) {
            await this.runLogger?.logRunFailed(runId, describeError(error));
            throw error;
        }

        if (state.nodeHistory[state.nodeHistory.length - 1] !== 'synthesis') {
            state.processingTime = elapsedSeconds(state);
        }

        const result = toResult(state);
        addLog(`[FiveWhys] run ${runId} finished: stopReason=${result.stopReason ?? 'none'} errors=${result.errors.length}`);
        await this.runLogger?.logRunCompleted(runId, {
            stopReason: result.stopReason,
            whyLevel: state.whyLevel,
            nodeHistory: state.nodeHistory,
            errors: result.errors,
        });
        return result;
    }

    private async runGraph(state: FiveWhysState, ctx: FiveWhysNodeContext, runId: string, options: AnalyzeOptions): Promise<void> {
        const limit = this.config.graph.recursionLimit;
        let node: GraphTarget = START_NODE;
        let step = 0;

        while (node !== END) {
            if (options.signal?.aborted) {
                throw new RunAbortedError(this.id);
            }
            if (step >= limit) {
                addLog(`[FiveWhys] run ${runId} hit the step limit (${limit}) before ${node}`);
                state.errors.push(`Step limit of ${limit} reached before the analysis finished`);
                state.shouldContinue = false;
                state.stopReason = 'step_limit_reached';
                return;
            }

            step += 1;
            state.nodeHistory.push(node);
            addLog(`[FiveWhys] run ${runId} step ${step}: ${node}`);
            this.runLogger?.logNode(runId, node, step);
            options.onProgress?.({ node, step });

            const errorsBefore = state.errors.length;
            await FIVE_WHYS_NODE_HANDLERS[node](state, ctx);
            options.onStepCompleted?.(node, state);

            const stepFailed = state.errors.length > errorsBefore;
            for (const error of state.errors.slice(errorsBefore)) {
                this.runLogger?.logEvent(runId, `ERROR in ${node}`, error);
            }
            node = nextNode(node, state, stepFailed);
        }
    }
}

function toResult(state: FiveWhysState): FiveWhysResult {
    return {
        problem: state.problemStatement,
        rootCause: state.finalRootCause,
        whyChain: state.whyChain.map(entry => ({ ...entry, alternatives: [...entry.alternatives] })),
        solutions: [...state.potentialSolutions],
        report: state.finalReport,
        processingTime: state.processingTime,
        stopReason: state.stopReason,
        errors: [...state.errors],
    };
}
