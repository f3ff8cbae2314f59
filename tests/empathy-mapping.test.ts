import { describe, it, expect, vi } from 'vitest';
import { createAgent } from '../packages/agents/empathy-mapping/index.js';
import {
  SupportTicketListSchema,
  SupportTicketSchema,
  type SupportTicket,
  type SupportTicketInput,
} from '../packages/agents/empathy-mapping/entities.js';
import { MockConsentRequester, MockDocumentSink, redactPii, validateConsent, type TicketSource } from '../packages/agents/empathy-mapping/tools.js';
import { ScriptedLlmClient, type LlmScript } from './helpers/fake-llm.js';

const NOW = new Date('2026-03-01T12:00:00Z');

const grantedConsent = (userId: string, scope: string[] = ['empathy_mapping']) => ({
  consentId: `consent-${userId}`,
  userId,
  dataSource: 'support_ticket' as const,
  consentScope: scope,
  consentStatus: 'granted' as const,
  grantedAt: '2025-06-01T00:00:00Z',
  expiresAt: '2027-06-01T00:00:00Z',
});

const RAW_TICKETS: SupportTicketInput[] = [
  {
    ticketId: 'T-1',
    title: 'Cannot sign in',
    description: "I can't log in. Reach me at jane.doe@example.com or 555-123-4567.",
    category: 'login',
    priority: 'high',
    customerId: 'c-1',
    createdAt: '2026-02-20T09:00:00Z',
    consentRecord: grantedConsent('c-1'),
  },
  {
    ticketId: 'T-2',
    title: 'Password reset loop',
    description: 'The reset link sends me back to the start.',
    customerId: 'c-2',
    createdAt: '2026-02-21T09:00:00Z',
  },
  {
    ticketId: 'T-3',
    title: 'Locked out',
    description: 'Locked out after two attempts.',
    customerId: 'c-3',
    createdAt: '2026-02-22T09:00:00Z',
    consentRecord: { ...grantedConsent('c-3'), expiresAt: '2026-01-01T00:00:00Z' },
  },
  {
    ticketId: 'T-4',
    title: 'Slow dashboard',
    description: 'The dashboard takes ages after login.',
    customerId: 'c-1',
    createdAt: '2026-02-23T09:00:00Z',
    consentRecord: grantedConsent('c-1', ['analytics']),
  },
  {
    ticketId: 'T-5',
    title: 'Double charge',
    description: 'Card 4111 1111 1111 1111 was charged twice after I signed in.',
    category: 'billing',
    customerId: 'c-4',
    createdAt: '2026-02-24T09:00:00Z',
    consentRecord: grantedConsent('c-4'),
  },
];

const TICKETS: SupportTicket[] = SupportTicketListSchema.parse(RAW_TICKETS);

const quadrant = (insight: string) => ({ insights: [insight], quotes: [`"${insight}"`], confidence: 0.7 });

const EMPATHY_ANALYSIS = {
  say: quadrant('I cannot log in'),
  think: quadrant('The product does not trust me'),
  do: quadrant('Retries the password reset'),
  feel: quadrant('Frustrated'),
  goals: ['Get into the account quickly'],
  pains: ['Reset loop'],
  gains: ['Remembered device'],
  latentNeeds: ['Confidence that billing is safe'],
  overallSentiment: 'negative',
  confidence: 0.75,
};

const script = (overrides: LlmScript['structured'] = {}): LlmScript => ({
  structured: {
    clarification: [{ clarifiedProblem: 'Why do customers struggle to sign in?' }],
    empathy_map: [EMPATHY_ANALYSIS],
    ...overrides,
  },
});

async function buildAgent(llmScript: LlmScript, ticketSource?: TicketSource) {
  const llm = new ScriptedLlmClient(llmScript);
  const consentRequester = new MockConsentRequester();
  const documentSink = new MockDocumentSink();
  const agent = await createAgent({ llm }, { consentRequester, documentSink, ticketSource, now: () => NOW });
  return { llm, agent, consentRequester, documentSink };
}

describe('EmpathyMappingAgent.analyze', () => {
  it('builds and publishes a map from consented, redacted tickets', async () => {
    const { agent, llm, documentSink } = await buildAgent(script());

    const result = await agent.analyze({ problem: 'sign-in complaints', tickets: TICKETS });

    expect(result.problem).toBe('Why do customers struggle to sign in?');
    expect(result.empathyMap?.say).toEqual({
      quadrantType: 'say',
      insights: ['I cannot log in'],
      quotes: ['"I cannot log in"'],
      confidenceScore: 0.7,
    });
    expect(result.empathyMap?.latentNeeds).toEqual(['Confidence that billing is safe']);
    expect(result.empathyMap?.ticketCount).toBe(2);
    expect(result.document).toEqual({ documentId: 'doc-1', url: 'https://docs.example.com/empathy-maps/doc-1' });
    expect(documentSink.documents.get('doc-1')).toBe(result.empathyMap);
    expect(result.metrics).toEqual({
      totalTicketsProcessed: 2,
      totalCustomers: 2,
      processingTimeSeconds: 0,
      piiRedactionCount: 3,
      consentValidationCount: 5,
      empathyMapsGenerated: 1,
      averageConfidenceScore: 0.75,
    });
    expect(result.warnings).toEqual([]);
    expect(result.errors).toEqual([]);

    const analysisInput = llm.callsFor('empathy_map')[0]?.messages[1]?.content ?? '';
    expect(analysisInput).toContain(
      "### Ticket T-1 [login, high, open]\nCannot sign in\n\nI can't log in. Reach me at [EMAIL] or [PHONE]."
    );
    expect(analysisInput).toContain('Card [CARD] was charged twice');
    expect(analysisInput).not.toContain('jane.doe@example.com');
    expect(analysisInput).not.toContain('T-2');
  });

  it('records consent violations and requests missing consent', async () => {
    const { agent, consentRequester } = await buildAgent(script());

    const result = await agent.analyze({ problem: 'sign-in complaints', tickets: TICKETS });

    expect(result.consentViolations).toEqual([
      { ticketId: 'T-2', customerId: 'c-2', reason: 'no consent record' },
      { ticketId: 'T-3', customerId: 'c-3', reason: 'consent expired at 2026-01-01T00:00:00.000Z' },
      { ticketId: 'T-4', customerId: 'c-1', reason: 'consent scope lacks empathy_mapping' },
    ]);
    expect(result.pendingApprovals).toEqual([
      {
        customerId: 'c-2',
        ticketIds: ['T-2'],
        consentId: 'consent-1',
        status: 'sent',
        requestedScope: ['empathy_mapping'],
        requestedAt: NOW,
      },
    ]);
    expect(consentRequester.sent).toEqual([{ userId: 'c-2', consentScope: ['empathy_mapping'] }]);
  });

  it('skips analysis when there are no tickets', async () => {
    const { agent, llm } = await buildAgent(script());

    const result = await agent.analyze({ problem: 'sign-in complaints' });

    expect(result.empathyMap).toBeNull();
    expect(result.document).toBeNull();
    expect(result.warnings).toEqual(['No support tickets available; empathy analysis skipped']);
    expect(result.metrics.empathyMapsGenerated).toBe(0);
    expect(llm.callsFor('empathy_map')).toHaveLength(0);
  });

  it('skips analysis when no ticket has valid consent', async () => {
    const { agent, llm } = await buildAgent(script());
    const withoutConsent = TICKETS.filter(ticket => ticket.ticketId === 'T-2' || ticket.ticketId === 'T-3');

    const result = await agent.analyze({ problem: 'sign-in complaints', tickets: withoutConsent });

    expect(result.warnings).toEqual(['No tickets with valid consent; empathy analysis skipped']);
    expect(result.metrics.consentValidationCount).toBe(2);
    expect(result.metrics.totalTicketsProcessed).toBe(0);
    expect(llm.callsFor('empathy_map')).toHaveLength(0);
  });

  it('reads tickets from the configured source', async () => {
    const source: TicketSource = { fetchTickets: vi.fn(async () => TICKETS.slice(0, 1)) };
    const { agent } = await buildAgent(script(), source);

    const result = await agent.analyze({ problem: 'sign-in complaints' });

    expect(source.fetchTickets).toHaveBeenCalledWith({ problem: 'Why do customers struggle to sign in?' });
    expect(result.metrics.totalTicketsProcessed).toBe(1);
  });

  it('records a failing ticket source', async () => {
    const source: TicketSource = {
      fetchTickets: async () => {
        throw new Error('desk offline');
      },
    };
    const { agent } = await buildAgent(script(), source);

    const result = await agent.analyze({ problem: 'sign-in complaints' });

    expect(result.errors).toEqual(['Failed to fetch support tickets: desk offline']);
    expect(result.warnings).toEqual(['No support tickets available; empathy analysis skipped']);
  });

  it('records a failed analysis and publishes nothing', async () => {
    const { agent, documentSink } = await buildAgent(script({ empathy_map: [new Error('model offline')] }));

    const result = await agent.analyze({ problem: 'sign-in complaints', tickets: TICKETS });

    expect(result.errors).toEqual(['Failed to parse empathy analysis response: model offline']);
    expect(result.empathyMap).toBeNull();
    expect(result.document).toBeNull();
    expect(documentSink.documents.size).toBe(0);
    expect(result.metrics.piiRedactionCount).toBe(3);
  });
});

describe('EmpathyMappingAgent.start', () => {
  it('validates ticket parameters and renders the map', async () => {
    const { agent } = await buildAgent(script());
    const onCompleted = vi.fn();

    const handle = agent.start('sign-in complaints', { parameters: { tickets: RAW_TICKETS } }, { onCompleted });

    await expect(handle.completion).resolves.toBe(true);
    const output: unknown = onCompleted.mock.calls[0]?.[0];
    expect(output).toContain('Overall Sentiment: negative');
    expect(output).toContain('Document: https://docs.example.com/empathy-maps/doc-1 (doc-1)');
  });

  it('fails on malformed tickets', async () => {
    const { agent } = await buildAgent(script());
    const onFailed = vi.fn();

    const handle = agent.start('sign-in complaints', { parameters: { tickets: [{ ticketId: 'T-9' }] } }, { onFailed });

    await expect(handle.completion).resolves.toBe(false);
    expect(onFailed).toHaveBeenCalledTimes(1);
  });
});

describe('validateConsent', () => {
  const ticket = (overrides: Partial<SupportTicketInput> = {}): SupportTicket =>
    SupportTicketSchema.parse({ ...RAW_TICKETS[0], ...overrides });

  it('accepts granted, unexpired consent with the right scope', () => {
    expect(validateConsent(ticket(), NOW).valid).toBe(true);
  });

  it('rejects consent that is not granted', () => {
    const check = validateConsent(ticket({ consentRecord: { ...grantedConsent('c-1'), consentStatus: 'revoked' } }), NOW);
    expect(check).toEqual({ valid: false, missing: false, reason: 'consent status is revoked' });
  });

  it('rejects consent for another data source scope', () => {
    const check = validateConsent(ticket({ consentRecord: grantedConsent('c-1', ['marketing']) }), NOW);
    expect(check).toEqual({ valid: false, missing: false, reason: 'consent scope lacks empathy_mapping' });
  });

  it('flags a missing record', () => {
    expect(validateConsent(ticket({ consentRecord: undefined }), NOW)).toEqual({
      valid: false,
      missing: true,
      reason: 'no consent record',
    });
  });
});

describe('redactPii', () => {
  it('replaces emails, card numbers and phone numbers', () => {
    const document = redactPii('T-1', 'Email a@b.co, card 4111-1111-1111-1111, phone (555) 123-4567.');

    expect(document.redactedContent).toBe('Email [EMAIL], card [CARD], phone [PHONE].');
    expect(document.piiEntities.map(entity => entity.entityType)).toEqual(['email', 'card', 'phone']);
    expect(document.piiEntities.map(entity => entity.piiLevel)).toEqual(['medium', 'critical', 'medium']);
    expect(document.redactionConfidence).toBe(0.85);
  });

  it('records positions in the original text', () => {
    const document = redactPii('T-1', 'Call +1 555 123 4567 today');

    expect(document.redactedContent).toBe('Call [PHONE] today');
    expect(document.piiEntities).toEqual([
      {
        entityType: 'phone',
        originalText: '+1 555 123 4567',
        redactedText: '[PHONE]',
        confidence: 0.85,
        piiLevel: 'medium',
        startPosition: 5,
        endPosition: 20,
      },
    ]);
  });

  it('leaves text without personal data unchanged', () => {
    const document = redactPii('T-1', 'Order 42 arrived late');

    expect(document.redactedContent).toBe('Order 42 arrived late');
    expect(document.piiEntities).toEqual([]);
    expect(document.redactionConfidence).toBe(1);
  });
});
