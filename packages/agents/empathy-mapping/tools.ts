/**
 * Collaborators of the empathy-mapping pipeline plus the deterministic
 * consent and redaction helpers. The external systems (ticket desk, consent
 * forms, document store) are in-memory stand-ins until real integrations exist.
 */

import { addLog } from '@insight/shared/logger';
import {
    EMPATHY_MAPPING_SCOPE,
    type ConsentRecord,
    type EmpathyMap,
    type PiiEntity,
    type PublishedDocument,
    type RedactedDocument,
    type SupportTicket,
} from './entities.js';

export interface TicketQuery {
    problem: string;
    ticketIds?: string[];
}

export interface TicketSource {
    fetchTickets(query: TicketQuery): Promise<SupportTicket[]>;
}

export class InMemoryTicketSource implements TicketSource {
    constructor(private readonly tickets: SupportTicket[] = []) {}

    async fetchTickets(query: TicketQuery): Promise<SupportTicket[]> {
        const { ticketIds } = query;
        if (!ticketIds) {
            return [...this.tickets];
        }
        return this.tickets.filter(ticket => ticketIds.includes(ticket.ticketId));
    }
}

export interface ConsentRequest {
    consentId: string;
    status: string;
}

export interface ConsentRequester {
    sendConsentForm(userId: string, consentScope: string[]): Promise<ConsentRequest>;
}

export class MockConsentRequester implements ConsentRequester {
    readonly sent: Array<{ userId: string; consentScope: string[] }> = [];

    async sendConsentForm(userId: string, consentScope: string[]): Promise<ConsentRequest> {
        this.sent.push({ userId, consentScope: [...consentScope] });
        addLog(`[EmpathyMapping] consent form sent to ${userId} for ${consentScope.join(', ')}`);
        return { consentId: `consent-${this.sent.length}`, status: 'sent' };
    }
}

export interface DocumentSink {
    createDocument(map: EmpathyMap): Promise<PublishedDocument>;
}

export class MockDocumentSink implements DocumentSink {
    readonly documents = new Map<string, EmpathyMap>();

    async createDocument(map: EmpathyMap): Promise<PublishedDocument> {
        const documentId = `doc-${this.documents.size + 1}`;
        this.documents.set(documentId, map);
        return { documentId, url: `https://docs.example.com/empathy-maps/${documentId}` };
    }
}

// ---------------------------------------------------------------------------
// Consent
// ---------------------------------------------------------------------------

export type ConsentCheck =
    | { valid: true; record: ConsentRecord }
    | { valid: false; missing: boolean; reason: string };

export function validateConsent(ticket: SupportTicket, now: Date): ConsentCheck {
    const record = ticket.consentRecord;
    if (!record) {
        return { valid: false, missing: true, reason: 'no consent record' };
    }
    if (record.consentStatus !== 'granted') {
        return { valid: false, missing: false, reason: `consent status is ${record.consentStatus}` };
    }
    if (record.revokedAt && record.revokedAt.getTime() <= now.getTime()) {
        return { valid: false, missing: false, reason: `consent revoked at ${record.revokedAt.toISOString()}` };
    }
    if (record.expiresAt && record.expiresAt.getTime() <= now.getTime()) {
        return { valid: false, missing: false, reason: `consent expired at ${record.expiresAt.toISOString()}` };
    }
    if (record.dataSource !== ticket.sourceType) {
        return { valid: false, missing: false, reason: `consent covers ${record.dataSource}, not ${ticket.sourceType}` };
    }
    if (!record.consentScope.includes(EMPATHY_MAPPING_SCOPE)) {
        return { valid: false, missing: false, reason: `consent scope lacks ${EMPATHY_MAPPING_SCOPE}` };
    }
    return { valid: true, record };
}

// ---------------------------------------------------------------------------
// PII redaction
// ---------------------------------------------------------------------------

interface PiiPattern {
    entityType: PiiEntity['entityType'];
    pattern: RegExp;
    replacement: string;
    piiLevel: PiiEntity['piiLevel'];
    confidence: number;
}

// Earlier patterns win where matches overlap.
const PII_PATTERNS: PiiPattern[] = [
    {
        entityType: 'email',
        pattern: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g,
        replacement: '[EMAIL]',
        piiLevel: 'medium',
        confidence: 0.95,
    },
    {
        entityType: 'card',
        pattern: /(?<!\d)(?:\d[ -]?){12,18}\d(?!\d)/g,
        replacement: '[CARD]',
        piiLevel: 'critical',
        confidence: 0.9,
    },
    {
        entityType: 'phone',
        pattern: /(?<![\d+])(?:\+\d{1,3}[ .-]?)?(?:\(\d{3}\)|\d{3})[ .-]?\d{3}[ .-]?\d{4}(?!\d)/g,
        replacement: '[PHONE]',
        piiLevel: 'medium',
        confidence: 0.85,
    },
];

export function findPiiEntities(content: string): PiiEntity[] {
    const entities: PiiEntity[] = [];
    const overlaps = (start: number, end: number) =>
        entities.some(entity => start < entity.endPosition && entity.startPosition < end);

    for (const { entityType, pattern, replacement, piiLevel, confidence } of PII_PATTERNS) {
        for (const match of content.matchAll(pattern)) {
            const start = match.index ?? 0;
            const end = start + match[0].length;
            if (overlaps(start, end)) {
                continue;
            }
            entities.push({
                entityType,
                originalText: match[0],
                redactedText: replacement,
                confidence,
                piiLevel,
                startPosition: start,
                endPosition: end,
            });
        }
    }

    return entities.sort((a, b) => a.startPosition - b.startPosition);
}

export function redactPii(ticketId: string, content: string, now: Date = new Date()): RedactedDocument {
    const piiEntities = findPiiEntities(content);
    let redactedContent = '';
    let cursor = 0;
    for (const entity of piiEntities) {
        redactedContent += content.slice(cursor, entity.startPosition) + entity.redactedText;
        cursor = entity.endPosition;
    }
    redactedContent += content.slice(cursor);

    return {
        ticketId,
        originalContent: content,
        redactedContent,
        piiEntities,
        redactionTimestamp: now,
        redactionConfidence: piiEntities.length === 0 ? 1 : Math.min(...piiEntities.map(entity => entity.confidence)),
    };
}

export const ticketContent = (ticket: SupportTicket): string => `${ticket.title}\n\n${ticket.description}`;
