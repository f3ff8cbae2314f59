import { fiveWhys } from '@insight/agents';

const pad = (label: string, width: number) => label.padEnd(width, ' ');

const STEP_LIMIT = fiveWhys.resolveFiveWhysConfig().graph.recursionLimit;
// entry, solution_generation and synthesis run once; each why level costs five steps
const MAX_COMPLETE_DEPTH = Math.floor((STEP_LIMIT - 3) / 5);

const WIDTH = 26;

export const formatCliUsage = (): string => {
  const lines = [
    'Usage: insight <command> -p "<text>" [options]',
    '',
    'Commands:',
    `  ${pad('five-whys', WIDTH)}Root-cause analysis of a problem statement`,
    `  ${pad('vote', WIDTH)}Score a user story from 0 (weak) to 5 (good)`,
    `  ${pad('empathy', WIDTH)}Build an empathy map from support tickets`,
    '',
    'Options:',
    `  ${pad('-h, --help', WIDTH)}Show this message and exit`,
    `  ${pad('-p, --prompt <text>', WIDTH)}Problem statement or user story`,
    `  ${pad('-w, --workspace <path>', WIDTH)}Workspace holding .insight/.env.local`,
    `  ${pad('--verbose', WIDTH)}Print every step as it runs`,
    `  ${pad('--max-whys <n>', WIDTH)}five-whys: maximum why levels (default 5)`,
    `  ${pad('', WIDTH)}runs stop after ${STEP_LIMIT} steps, so depths above ${MAX_COMPLETE_DEPTH} end early (step_limit_reached)`,
    `  ${pad('--no-search', WIDTH)}five-whys: skip web search`,
    `  ${pad('--argument <text>', WIDTH)}vote: argument to weigh (repeatable)`,
    `  ${pad('--tickets <file.json>', WIDTH)}empathy: support tickets to analyze`,
    '',
    'Examples:',
    '  insight five-whys -p "Checkout conversion dropped 20% last week" --max-whys 4',
    '  insight vote -p "As a user, I want to export a report in one click" --argument "Exports may leak data"',
    '  insight empathy -p "Why do users abandon onboarding?" --tickets tickets.json',
  ];
  return lines.join('\n');
};

export const printCliUsage = (): void => {
  console.log(formatCliUsage());
};
