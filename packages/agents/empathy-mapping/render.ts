import type { EmpathyMapQuadrant } from './entities.js';
import type { EmpathyResult } from './EmpathyMappingAgent.js';

const renderList = (title: string, items: string[]): string[] =>
    items.length === 0 ? [`${title}: (none)`] : [`${title}:`, ...items.map(item => `  - ${item}`)];

const renderQuadrant = (label: string, quadrant: EmpathyMapQuadrant): string[] => [
    `${label} (confidence ${quadrant.confidenceScore.toFixed(2)})`,
    ...quadrant.insights.map(insight => `  - ${insight}`),
    ...quadrant.quotes.map(quote => `  "${quote}"`),
];

export function renderEmpathyResult(result: EmpathyResult): string {
    const lines: string[] = ['EMPATHY MAP', '='.repeat(50), `Problem: ${result.problem}`, ''];
    const map = result.empathyMap;

    if (map) {
        lines.push(...renderQuadrant('SAY', map.say));
        lines.push(...renderQuadrant('THINK', map.think));
        lines.push(...renderQuadrant('DO', map.do));
        lines.push(...renderQuadrant('FEEL', map.feel));
        lines.push('');
        lines.push(...renderList('Goals', map.goals));
        lines.push(...renderList('Pains', map.pains));
        lines.push(...renderList('Gains', map.gains));
        lines.push(...renderList('Latent Needs', map.latentNeeds));
        lines.push(`Overall Sentiment: ${map.overallSentiment}`);
    } else {
        lines.push('No empathy map generated.');
    }

    if (result.document) {
        lines.push(`Document: ${result.document.url} (${result.document.documentId})`);
    }

    const { metrics } = result;
    lines.push('');
    lines.push(
        `Tickets: ${metrics.totalTicketsProcessed} processed, ${metrics.consentValidationCount} consent checks, ` +
            `${metrics.totalCustomers} customers, ${metrics.piiRedactionCount} redactions`
    );
    lines.push(`Processing Time: ${metrics.processingTimeSeconds.toFixed(2)} seconds`);

    if (result.consentViolations.length > 0) {
        lines.push('');
        lines.push(...renderList('Consent Violations', result.consentViolations.map(v => `${v.ticketId} (${v.customerId}): ${v.reason}`)));
    }
    if (result.pendingApprovals.length > 0) {
        lines.push(...renderList('Pending Approvals', result.pendingApprovals.map(a => `${a.customerId}: ${a.consentId} ${a.status}`)));
    }
    if (result.warnings.length > 0) {
        lines.push(...renderList('Warnings', result.warnings));
    }
    if (result.errors.length > 0) {
        lines.push(...renderList('Errors', result.errors));
    }
    return lines.join('\n');
}
