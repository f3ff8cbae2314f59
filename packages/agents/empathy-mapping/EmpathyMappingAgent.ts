/**
 * EmpathyMappingAgent - builds an empathy map from consented, redacted support tickets
 *
 * clarify → ingest → consent_validation → pii_redaction → empathy_analysis → publish → summary
 *
 * The pipeline is linear: a step that cannot produce anything records a
 * warning or error and the following steps work with what is there.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { AgentProgressPayload } from '@insight/core';
import { addLog } from '@insight/shared/logger';
import type { RunLogger } from '@insight/shared/run-logger';
import { RunAbortedError } from '../runtime/errors.js';
import { describeError, type LlmClient } from '../runtime/llm.js';
import type { PromptLibrary } from '../runtime/promptLoader.js';
import { startAgentRun } from '../runtime/startRun.js';
import type { AgentStartContext, AgentStartSinks, ExecutionHandle, RunnableAgent } from '../runtime/types.js';
import {
    EMPATHY_MAPPING_SCOPE,
    SupportTicketListSchema,
    type ConsentViolation,
    type EmpathyMap,
    type PendingApproval,
    type ProcessingMetrics,
    type PublishedDocument,
    type SupportTicket,
} from './entities.js';
import { buildAnalysisMessages, buildClarificationMessages, EMPATHY_PROMPTS } from './prompts.js';
import { renderEmpathyResult } from './render.js';
import { EmpathyAnalysisSchema, EmpathyClarificationSchema } from './schema.js';
import { createInitialEmpathyState, EMPATHY_PIPELINE, type EmpathyMappingState, type EmpathyNode } from './state.js';
import {
    InMemoryTicketSource,
    MockConsentRequester,
    MockDocumentSink,
    redactPii,
    ticketContent,
    validateConsent,
    type ConsentRequester,
    type DocumentSink,
    type TicketSource,
} from './tools.js';

export const EMPATHY_MAPPING_AGENT_ID = 'empathy-mapping';
const EMPATHY_MAPPING_DESCRIPTION = 'Empathy Mapping - say/think/do/feel synthesis from support tickets';
const SUPPORT_TICKET_SEGMENT = 'support-ticket-customers';

export interface EmpathyAnalyzeInput {
    problem: string;
    /** Analyzed instead of the configured ticket source when given. */
    tickets?: SupportTicket[];
}

export interface EmpathyResult {
    problem: string;
    empathyMap: EmpathyMap | null;
    document: PublishedDocument | null;
    metrics: ProcessingMetrics;
    consentViolations: ConsentViolation[];
    pendingApprovals: PendingApproval[];
    warnings: string[];
    errors: string[];
}

export interface EmpathyAnalyzeOptions {
    runId?: string;
    signal?: AbortSignal;
    onProgress?: (progress: AgentProgressPayload) => void;
}

export interface EmpathyMappingAgentOptions {
    llm: LlmClient;
    prompts: PromptLibrary;
    ticketSource?: TicketSource;
    consentRequester?: ConsentRequester;
    documentSink?: DocumentSink;
    runLogger?: RunLogger;
    /** Clock used for consent expiry checks. */
    now?: () => Date;
}

const EmpathyParametersSchema = z.object({
    tickets: SupportTicketListSchema.optional(),
});

type StepContext = { signal?: AbortSignal };

export class EmpathyMappingAgent implements RunnableAgent {
    readonly id = EMPATHY_MAPPING_AGENT_ID;
    readonly description = EMPATHY_MAPPING_DESCRIPTION;

    private readonly llm: LlmClient;
    private readonly prompts: PromptLibrary;
    private readonly ticketSource: TicketSource;
    private readonly consentRequester: ConsentRequester;
    private readonly documentSink: DocumentSink;
    private readonly runLogger?: RunLogger;
    private readonly now: () => Date;

    constructor(options: EmpathyMappingAgentOptions) {
        this.llm = options.llm;
        this.prompts = options.prompts.require(EMPATHY_PROMPTS);
        this.ticketSource = options.ticketSource ?? new InMemoryTicketSource();
        this.consentRequester = options.consentRequester ?? new MockConsentRequester();
        this.documentSink = options.documentSink ?? new MockDocumentSink();
        this.runLogger = options.runLogger;
        this.now = options.now ?? (() => new Date());
    }

    start(userInput: string, context: AgentStartContext, sinks: AgentStartSinks): ExecutionHandle {
        return startAgentRun(this.id, context, sinks, async ({ runId, signal }) => {
            const { tickets } = EmpathyParametersSchema.parse(context.parameters ?? {});
            const result = await this.analyze(
                { problem: userInput.trim(), tickets },
                {
                    runId,
                    signal,
                    onProgress: progress => {
                        sinks.onEvent?.({ level: 'info', message: `node:${progress.node}` });
                        sinks.onProgress?.(progress);
                    },
                }
            );
            for (const warning of result.warnings) {
                sinks.onEvent?.({ level: 'warning', message: warning });
            }
            for (const error of result.errors) {
                sinks.onEvent?.({ level: 'error', message: error });
            }
            return renderEmpathyResult(result);
        });
    }

    async analyze(input: EmpathyAnalyzeInput, options: EmpathyAnalyzeOptions = {}): Promise<EmpathyResult> {
        const runId = options.runId ?? `${this.id}-${randomUUID()}`;
        const state = createInitialEmpathyState(input.problem, this.now().getTime());
        const source = input.tickets ? new InMemoryTicketSource(input.tickets) : this.ticketSource;
        const ctx: StepContext = { signal: options.signal };

        addLog(`[EmpathyMapping] run ${runId} started`);
        this.runLogger?.logRunStarted(runId, this.id, input.problem, { suppliedTickets: input.tickets?.length ?? null });

        const steps: Record<EmpathyNode, () => Promise<void> | void> = {
            clarify: () => this.clarify(state, ctx),
            ingest: () => this.ingest(state, source),
            consent_validation: () => this.validateConsents(state),
            pii_redaction: () => this.redact(state),
            empathy_analysis: () => this.analyzeTickets(state, ctx),
            publish: () => this.publish(state),
            summary: () => this.summarize(state),
        };

        try {
            for (const [index, node] of EMPATHY_PIPELINE.entries()) {
                if (options.signal?.aborted) {
                    throw new RunAbortedError(this.id);
                }
                const step = index + 1;
                state.processingHistory.push(node);
                addLog(`[EmpathyMapping] run ${runId} step ${step}: ${node}`);
                this.runLogger?.logNode(runId, node, step);
                options.onProgress?.({ node, step });

                const started = performance.now();
                await steps[node]();
                state.nodeExecutionTimes[node] = (performance.now() - started) / 1000;
            }
        } catch (error) {
            await this.runLogger?.logRunFailed(runId, describeError(error));
            throw error;
        }

        await this.runLogger?.logRunCompleted(runId, {
            metrics: state.metrics,
            warnings: state.warnings,
            errors: state.errors,
            nodeExecutionTimes: state.nodeExecutionTimes,
        });

        return {
            problem: state.problemStatement,
            empathyMap: state.empathyMap,
            document: state.document,
            metrics: { ...state.metrics },
            consentViolations: [...state.consentViolations],
            pendingApprovals: [...state.pendingApprovals],
            warnings: [...state.warnings],
            errors: [...state.errors],
        };
    }

    private async clarify(state: EmpathyMappingState, ctx: StepContext): Promise<void> {
        const result = await this.llm.completeStructured(
            buildClarificationMessages(this.prompts, state.problemStatement),
            EmpathyClarificationSchema,
            { schemaName: 'clarification', signal: ctx.signal }
        );
        if (result.ok && result.value.clarifiedProblem.trim()) {
            state.problemStatement = result.value.clarifiedProblem.trim();
        }
    }

    private async ingest(state: EmpathyMappingState, source: TicketSource): Promise<void> {
        try {
            state.supportTickets = await source.fetchTickets({ problem: state.problemStatement });
        } catch (error) {
            state.errors.push(`Failed to fetch support tickets: ${describeError(error)}`);
            state.supportTickets = [];
        }
        if (state.supportTickets.length === 0) {
            state.warnings.push('No support tickets available; empathy analysis skipped');
        }
    }

    private async validateConsents(state: EmpathyMappingState): Promise<void> {
        const now = this.now();
        const missingByCustomer = new Map<string, string[]>();

        for (const ticket of state.supportTickets) {
            state.consentValidationCount += 1;
            const check = validateConsent(ticket, now);
            if (check.valid) {
                state.consentedTickets.push(ticket);
                continue;
            }
            state.consentViolations.push({ ticketId: ticket.ticketId, customerId: ticket.customerId, reason: check.reason });
            if (check.missing) {
                missingByCustomer.set(ticket.customerId, [...(missingByCustomer.get(ticket.customerId) ?? []), ticket.ticketId]);
            }
        }

        // One consent request per customer, however many of their tickets lack consent.
        for (const [customerId, ticketIds] of missingByCustomer) {
            const scope = [EMPATHY_MAPPING_SCOPE];
            try {
                const request = await this.consentRequester.sendConsentForm(customerId, scope);
                state.pendingApprovals.push({
                    customerId,
                    ticketIds,
                    consentId: request.consentId,
                    status: request.status,
                    requestedScope: scope,
                    requestedAt: now,
                });
            } catch (error) {
                state.errors.push(`Failed to request consent from ${customerId}: ${describeError(error)}`);
            }
        }

        if (state.supportTickets.length > 0 && state.consentedTickets.length === 0) {
            state.warnings.push('No tickets with valid consent; empathy analysis skipped');
        }
    }

    private redact(state: EmpathyMappingState): void {
        const now = this.now();
        for (const ticket of state.consentedTickets) {
            const document = redactPii(ticket.ticketId, ticketContent(ticket), now);
            state.redactedDocuments.push(document);
            state.piiEntities.push(...document.piiEntities);
        }
    }

    private async analyzeTickets(state: EmpathyMappingState, ctx: StepContext): Promise<void> {
        if (state.consentedTickets.length === 0) {
            return;
        }
        const started = performance.now();
        const result = await this.llm.completeStructured(buildAnalysisMessages(this.prompts, state), EmpathyAnalysisSchema, {
            schemaName: 'empathy_map',
            signal: ctx.signal,
        });
        if (!result.ok) {
            state.errors.push(`Failed to parse empathy analysis response: ${result.error}`);
            return;
        }

        const analysis = result.value;
        state.empathyMap = {
            mapId: randomUUID(),
            segmentId: SUPPORT_TICKET_SEGMENT,
            createdAt: this.now(),
            say: { quadrantType: 'say', ...quadrant(analysis.say) },
            think: { quadrantType: 'think', ...quadrant(analysis.think) },
            do: { quadrantType: 'do', ...quadrant(analysis.do) },
            feel: { quadrantType: 'feel', ...quadrant(analysis.feel) },
            goals: analysis.goals,
            pains: analysis.pains,
            gains: analysis.gains,
            latentNeeds: analysis.latentNeeds,
            overallSentiment: analysis.overallSentiment,
            dataSourcesUsed: ['support_ticket'],
            ticketCount: state.consentedTickets.length,
            totalAnalysisTime: (performance.now() - started) / 1000,
            confidenceScore: analysis.confidence,
        };
    }

    private async publish(state: EmpathyMappingState): Promise<void> {
        if (!state.empathyMap) {
            return;
        }
        try {
            state.document = await this.documentSink.createDocument(state.empathyMap);
        } catch (error) {
            state.errors.push(`Failed to publish empathy map: ${describeError(error)}`);
        }
    }

    private summarize(state: EmpathyMappingState): void {
        const customers = new Set(state.consentedTickets.map(ticket => ticket.customerId));
        state.metrics = {
            totalTicketsProcessed: state.redactedDocuments.length,
            totalCustomers: customers.size,
            processingTimeSeconds: (this.now().getTime() - state.startedAt) / 1000,
            piiRedactionCount: state.piiEntities.length,
            consentValidationCount: state.consentValidationCount,
            empathyMapsGenerated: state.empathyMap ? 1 : 0,
            averageConfidenceScore: state.empathyMap?.confidenceScore ?? 0,
        };
    }
}

const quadrant = (value: { insights: string[]; quotes: string[]; confidence: number }) => ({
    insights: value.insights,
    quotes: value.quotes,
    confidenceScore: value.confidence,
});
