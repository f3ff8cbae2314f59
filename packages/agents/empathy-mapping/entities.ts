import { z } from 'zod';

export const CONSENT_STATUSES = ['pending', 'granted', 'denied', 'expired', 'revoked'] as const;
export type ConsentStatus = (typeof CONSENT_STATUSES)[number];

export const DATA_SOURCES = ['support_ticket'] as const;
export type DataSource = (typeof DATA_SOURCES)[number];

export type PiiLevel = 'none' | 'low' | 'medium' | 'high' | 'critical';

export const SENTIMENTS = ['positive', 'negative', 'neutral', 'mixed'] as const;
export type Sentiment = (typeof SENTIMENTS)[number];

/** Scope a consent record must carry for its ticket to be analyzed. */
export const EMPATHY_MAPPING_SCOPE = 'empathy_mapping';

// ISO strings from JSON exports, or Date objects from in-process callers.
const dateLike = () => z.union([z.string(), z.date()]).pipe(z.coerce.date());

export const ConsentRecordSchema = z.object({
    consentId: z.string().min(1),
    userId: z.string().min(1),
    dataSource: z.enum(DATA_SOURCES),
    consentScope: z.array(z.string()),
    consentStatus: z.enum(CONSENT_STATUSES),
    grantedAt: dateLike(),
    expiresAt: dateLike().optional(),
    revokedAt: dateLike().optional(),
    consentArtifactId: z.string().optional(),
});

export type ConsentRecord = z.output<typeof ConsentRecordSchema>;

export const SupportTicketSchema = z.object({
    ticketId: z.string().min(1),
    sourceType: z.enum(DATA_SOURCES).default('support_ticket'),
    title: z.string(),
    description: z.string(),
    category: z.string().default('general'),
    priority: z.string().default('normal'),
    status: z.string().default('open'),
    customerId: z.string().min(1),
    createdAt: dateLike(),
    metadata: z.record(z.unknown()).default({}),
    consentRecord: ConsentRecordSchema.optional(),
});

export type SupportTicket = z.output<typeof SupportTicketSchema>;
export type SupportTicketInput = z.input<typeof SupportTicketSchema>;

export const SupportTicketListSchema = z.array(SupportTicketSchema);

export interface PiiEntity {
    entityType: 'email' | 'phone' | 'card';
    originalText: string;
    redactedText: string;
    confidence: number;
    piiLevel: PiiLevel;
    /** Offsets into the original content, end exclusive. */
    startPosition: number;
    endPosition: number;
}

export interface RedactedDocument {
    ticketId: string;
    originalContent: string;
    redactedContent: string;
    piiEntities: PiiEntity[];
    redactionTimestamp: Date;
    redactionConfidence: number;
}

export interface EmpathyMapQuadrant {
    quadrantType: 'say' | 'think' | 'do' | 'feel';
    insights: string[];
    quotes: string[];
    confidenceScore: number;
}

export interface EmpathyMap {
    mapId: string;
    segmentId: string;
    createdAt: Date;
    say: EmpathyMapQuadrant;
    think: EmpathyMapQuadrant;
    do: EmpathyMapQuadrant;
    feel: EmpathyMapQuadrant;
    goals: string[];
    pains: string[];
    gains: string[];
    latentNeeds: string[];
    overallSentiment: Sentiment;
    dataSourcesUsed: DataSource[];
    ticketCount: number;
    totalAnalysisTime: number;
    confidenceScore: number;
}

export interface ConsentViolation {
    ticketId: string;
    customerId: string;
    reason: string;
}

export interface PendingApproval {
    customerId: string;
    ticketIds: string[];
    consentId: string;
    status: string;
    requestedScope: string[];
    requestedAt: Date;
}

export interface PublishedDocument {
    documentId: string;
    url: string;
}

export interface ProcessingMetrics {
    totalTicketsProcessed: number;
    totalCustomers: number;
    processingTimeSeconds: number;
    piiRedactionCount: number;
    consentValidationCount: number;
    empathyMapsGenerated: number;
    averageConfidenceScore: number;
}
