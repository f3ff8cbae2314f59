import type {
    ConsentViolation,
    EmpathyMap,
    PendingApproval,
    PiiEntity,
    ProcessingMetrics,
    PublishedDocument,
    RedactedDocument,
    SupportTicket,
} from './entities.js';

export const EMPATHY_PIPELINE = [
    'clarify',
    'ingest',
    'consent_validation',
    'pii_redaction',
    'empathy_analysis',
    'publish',
    'summary',
] as const;

export type EmpathyNode = (typeof EMPATHY_PIPELINE)[number];

export interface EmpathyMappingState {
    problemStatement: string;

    supportTickets: SupportTicket[];
    /** Tickets that passed consent validation. */
    consentedTickets: SupportTicket[];
    redactedDocuments: RedactedDocument[];
    piiEntities: PiiEntity[];

    consentViolations: ConsentViolation[];
    pendingApprovals: PendingApproval[];
    consentValidationCount: number;

    empathyMap: EmpathyMap | null;
    document: PublishedDocument | null;
    metrics: ProcessingMetrics;

    warnings: string[];
    errors: string[];
    processingHistory: EmpathyNode[];
    /** Seconds spent in each node. */
    nodeExecutionTimes: Partial<Record<EmpathyNode, number>>;
    startedAt: number;
}

export function emptyMetrics(): ProcessingMetrics {
    return {
        totalTicketsProcessed: 0,
        totalCustomers: 0,
        processingTimeSeconds: 0,
        piiRedactionCount: 0,
        consentValidationCount: 0,
        empathyMapsGenerated: 0,
        averageConfidenceScore: 0,
    };
}

export function createInitialEmpathyState(problem: string, now: number = Date.now()): EmpathyMappingState {
    return {
        problemStatement: problem,
        supportTickets: [],
        consentedTickets: [],
        redactedDocuments: [],
        piiEntities: [],
        consentViolations: [],
        pendingApprovals: [],
        consentValidationCount: 0,
        empathyMap: null,
        document: null,
        metrics: emptyMetrics(),
        warnings: [],
        errors: [],
        processingHistory: [],
        nodeExecutionTimes: {},
        startedAt: now,
    };
}
