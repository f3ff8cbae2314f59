import type { FiveWhysResult } from './FiveWhysAgent.js';

export function renderFiveWhysResult(result: FiveWhysResult): string {
    const lines: string[] = [];
    lines.push('ANALYSIS RESULTS');
    lines.push('='.repeat(50));
    lines.push(`Problem: ${result.problem}`);
    lines.push(`Root Cause: ${result.rootCause || '(not identified)'}`);
    lines.push('');
    lines.push('Why Chain:');
    if (result.whyChain.length === 0) {
        lines.push('  (empty)');
    }
    result.whyChain.forEach((why, index) => {
        lines.push(`  ${index + 1}. ${why.question.replace(/\n+/g, ' ')}`);
        lines.push(`     -> ${why.answer}`);
        if (why.evidence) {
            lines.push(`     Evidence: ${why.evidence}`);
        }
    });
    lines.push('');
    lines.push('Recommended Solutions:');
    if (result.solutions.length === 0) {
        lines.push('  (none)');
    }
    result.solutions.forEach((solution, index) => {
        lines.push(`  ${index + 1}. ${solution}`);
    });
    if (result.report) {
        lines.push('');
        lines.push('Full Report:');
        lines.push(result.report);
    }
    lines.push('');
    lines.push(`Processing Time: ${result.processingTime.toFixed(2)} seconds`);
    lines.push(`Stop Reason: ${result.stopReason ?? 'none'}`);
    if (result.errors.length > 0) {
        lines.push('');
        lines.push('Errors:');
        for (const error of result.errors) {
            lines.push(`  - ${error}`);
        }
    }
    return lines.join('\n');
}
