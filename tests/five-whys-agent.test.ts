import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi } from 'vitest';
import { createAgent, FIVE_WHYS_PROMPT_DIR } from '../packages/agents/five-whys/index.js';
import type { FiveWhysConfigInput } from '../packages/agents/five-whys/config.js';
import { resolveFiveWhysConfig } from '../packages/agents/five-whys/config.js';
import { whyQuestionNode } from '../packages/agents/five-whys/nodes.js';
import { createInitialState } from '../packages/agents/five-whys/state.js';
import { PreconditionViolationError, RunAbortedError } from '../packages/agents/runtime/errors.js';
import type { ChatMessage } from '../packages/agents/runtime/llm.js';
import { loadPromptLibrary } from '../packages/agents/runtime/promptLoader.js';
import type { SearchClient } from '../packages/agents/runtime/search.js';
import { RunLogger } from '../packages/shared/run-logger.js';
import {
  causeAnalysis,
  ScriptedLlmClient,
  solution,
  StaticSearchClient,
  validation,
  type LlmScript,
} from './helpers/fake-llm.js';

const PROBLEM = 'API latency doubled after the release';

const userMessage = (messages: ChatMessage[]) => messages.find(message => message.role === 'user')?.content ?? '';

const baseScript = (overrides: LlmScript['structured'] = {}): LlmScript => ({
  structured: {
    clarification: [{ clarifiedProblem: PROBLEM, assumptions: ['traffic is unchanged'], evidenceNeeded: [] }],
    cause_analysis: (_messages, call) => causeAnalysis(`Cause ${call + 1}`),
    validation: [validation(false)],
    solution: [solution],
    ...overrides,
  },
  text: ['Final report'],
});

async function buildAgent(script: LlmScript, options: { search?: SearchClient; config?: FiveWhysConfigInput; runLogger?: RunLogger } = {}) {
  const llm = new ScriptedLlmClient(script);
  const agent = await createAgent({ llm, search: options.search, runLogger: options.runLogger }, options.config);
  return { llm, agent };
}

describe('FiveWhysAgent.analyze', () => {
  it('walks the chain until the depth limit and synthesizes the result', async () => {
    const { agent } = await buildAgent(baseScript());

    const result = await agent.analyze('latency is bad', 3);

    expect(result.problem).toBe(PROBLEM);
    expect(result.whyChain.map(entry => entry.answer)).toEqual(['Cause 1', 'Cause 2', 'Cause 3']);
    expect(result.whyChain.map(entry => entry.level)).toEqual([1, 2, 3]);
    expect(result.whyChain[0]?.question).toBe(`Why does this problem occur: ${PROBLEM}?`);
    expect(result.whyChain[1]?.question).toBe(
      `The original problem is ${PROBLEM}.\nThe last potential cause is identified as: Cause 1.\n\nRespond with a single question on why the last potential cause occurs.`
    );
    expect(result.whyChain[0]?.evidence).toBe('evidence for Cause 1');
    expect(result.rootCause).toBe('Cause 3');
    expect(result.solutions).toEqual(['Roll back the cache change']);
    expect(result.report).toBe('Final report');
    expect(result.stopReason).toBe('max_whys_reached');
    expect(result.errors).toEqual([]);
    expect(result.processingTime).toBeGreaterThanOrEqual(0);
  });

  it('keeps the raw problem when clarification fails', async () => {
    const { agent } = await buildAgent(baseScript({ clarification: [new Error('rate limited')] }));

    const result = await agent.analyze('latency is bad', 1);

    expect(result.problem).toBe('latency is bad');
    expect(result.whyChain[0]?.question).toBe('Why does this problem occur: latency is bad?');
    expect(result.errors).toEqual([]);
  });

  it('stops when validation flags the root cause', async () => {
    const { agent, llm } = await buildAgent(
      baseScript({ validation: [validation(false), validation(true)] })
    );

    const result = await agent.analyze(PROBLEM, 5);

    expect(result.stopReason).toBe('root_cause_identified');
    expect(result.whyChain).toHaveLength(2);
    expect(result.rootCause).toBe('Cause 2');
    expect(llm.callsFor('solution')).toHaveLength(1);
  });

  it('stops with insufficient_depth after two low-confidence causes', async () => {
    const { agent } = await buildAgent(
      baseScript({ cause_analysis: [causeAnalysis('Shallow A', 0.1), causeAnalysis('Shallow B', 0.2)] })
    );

    const result = await agent.analyze(PROBLEM, 10);

    expect(result.stopReason).toBe('insufficient_depth');
    expect(result.whyChain.map(entry => entry.answer)).toEqual(['Shallow A', 'Shallow B']);
  });

  it('gives up after repeated cause analysis failures', async () => {
    const { agent, llm } = await buildAgent(baseScript({ cause_analysis: [new Error('model unavailable')] }));

    const result = await agent.analyze(PROBLEM, 5);

    expect(result.stopReason).toBe('too_many_errors');
    expect(result.errors).toEqual(
      Array.from({ length: 4 }, () => 'Failed to parse cause analysis response: model unavailable')
    );
    expect(result.whyChain).toEqual([]);
    expect(result.rootCause).toBe('');
    expect(result.report).toBe('');
    expect(llm.callsFor('cause_analysis')).toHaveLength(4);
    expect(llm.callsFor('validation')).toHaveLength(0);
  });

  it('retries cause analysis after a single failure', async () => {
    const { agent } = await buildAgent(
      baseScript({ cause_analysis: [new Error('truncated output'), causeAnalysis('Recovered cause')] })
    );

    const result = await agent.analyze(PROBLEM, 1);

    expect(result.errors).toEqual(['Failed to parse cause analysis response: truncated output']);
    expect(result.whyChain).toHaveLength(1);
    expect(result.whyChain[0]?.level).toBe(1);
    expect(result.rootCause).toBe('Recovered cause');
    expect(result.stopReason).toBe('max_whys_reached');
  });

  it('records a failed validation and still decides', async () => {
    const { agent } = await buildAgent(baseScript({ validation: [new Error('bad json')] }));

    const result = await agent.analyze(PROBLEM, 1);

    expect(result.errors).toEqual(['Failed to parse validation response: bad json']);
    expect(result.stopReason).toBe('max_whys_reached');
    expect(result.rootCause).toBe('Cause 1');
  });

  it('records a failed solution step and still writes the report', async () => {
    const { agent } = await buildAgent(baseScript({ solution: [new Error('empty response')] }));

    const result = await agent.analyze(PROBLEM, 1);

    expect(result.errors).toEqual(['Failed to parse solution response: empty response']);
    expect(result.solutions).toEqual([]);
    expect(result.report).toBe('Final report');
  });

  it('records a failed report', async () => {
    const { agent } = await buildAgent({ ...baseScript(), text: [new Error('connection reset')] });

    const result = await agent.analyze(PROBLEM, 1);

    expect(result.report).toBe('');
    expect(result.errors).toEqual(['Failed to generate final report: connection reset']);
    expect(result.rootCause).toBe('Cause 1');
  });

  it('synthesizes an empty chain when no whys are allowed', async () => {
    const { agent, llm } = await buildAgent(baseScript());

    const result = await agent.analyze(PROBLEM, 0);

    expect(result.whyChain).toEqual([]);
    expect(result.rootCause).toBe('');
    expect(result.stopReason).toBe('max_whys_reached');
    expect(result.report).toBe('Final report');
    expect(llm.callsFor('cause_analysis')).toHaveLength(0);
  });

  it('rejects a negative or fractional depth', async () => {
    const { agent } = await buildAgent(baseScript());

    await expect(agent.analyze(PROBLEM, -1)).rejects.toBeInstanceOf(RangeError);
    await expect(agent.analyze(PROBLEM, 2.5)).rejects.toBeInstanceOf(RangeError);
  });

  it('ends at the step ceiling without throwing', async () => {
    const { agent, llm } = await buildAgent(baseScript(), { config: { graph: { recursionLimit: 5 } } });

    const result = await agent.analyze(PROBLEM, 5);

    expect(result.stopReason).toBe('step_limit_reached');
    expect(result.errors).toEqual(['Step limit of 5 reached before the analysis finished']);
    expect(result.whyChain).toHaveLength(1);
    expect(llm.callsFor('solution')).toHaveLength(0);
  });

  it('finishes five levels under the default ceiling and stops the sixth', async () => {
    const { agent: fiveLevels } = await buildAgent(baseScript());
    const { agent: sixLevels } = await buildAgent(baseScript());

    const complete = await fiveLevels.analyze(PROBLEM, 5);
    const cut = await sixLevels.analyze(PROBLEM, 6);

    expect(complete.stopReason).toBe('max_whys_reached');
    expect(complete.whyChain).toHaveLength(5);
    expect(complete.report).toBe('Final report');
    expect(cut.stopReason).toBe('step_limit_reached');
    expect(cut.whyChain).toHaveLength(6);
    expect(cut.solutions).toEqual([]);
    expect(cut.errors).toEqual(['Step limit of 30 reached before the analysis finished']);
  });

  it('holds the level invariants after every step', async () => {
    const { agent } = await buildAgent(
      baseScript({
        cause_analysis: [causeAnalysis('A'), new Error('glitch'), causeAnalysis('B'), causeAnalysis('C')],
      })
    );
    const observed: string[] = [];

    const result = await agent.analyze(PROBLEM, 3, {
      onStepCompleted: (node, state) => {
        observed.push(node);
        expect(state.whyLevel).toBeGreaterThanOrEqual(0);
        expect(state.whyLevel).toBeLessThanOrEqual(state.maxWhyLevels);
        expect(state.whyChain.length).toBeLessThanOrEqual(state.whyLevel);
      },
    });

    expect(result.whyChain.map(entry => entry.answer)).toEqual(['A', 'B', 'C']);
    expect(observed).toContain('error_handling');
    expect(observed[observed.length - 1]).toBe('synthesis');
  });

  it('produces the same chain for repeated runs on one instance', async () => {
    const answerFor = (messages: ChatMessage[]) => {
      const question = userMessage(messages);
      if (question.startsWith('Why does this problem occur')) return causeAnalysis('Cache hit rate fell');
      if (question.includes('Cache hit rate fell')) return causeAnalysis('TTL was lowered');
      return causeAnalysis('Config default changed');
    };
    const { agent } = await buildAgent(baseScript({ cause_analysis: answerFor }));

    const first = await agent.analyze(PROBLEM, 3);
    const second = await agent.analyze(PROBLEM, 3);

    expect(second.whyChain).toEqual(first.whyChain);
    expect(second.stopReason).toBe(first.stopReason);
    expect(first.whyChain.map(entry => entry.answer)).toEqual([
      'Cache hit rate fell',
      'TTL was lowered',
      'Config default changed',
    ]);
  });

  it('feeds filtered search results into cause analysis', async () => {
    const search = new StaticSearchClient({
      results: [
        { content: 'result a', score: 0.5 },
        { content: 'result b', score: 0.1 },
        { content: 'result c', score: 0.3 },
        { content: 'result d', score: 0.25 },
      ],
      responseTime: 1.2,
      engine: 'tavily',
    });
    const { agent, llm } = await buildAgent(baseScript(), { search });

    await agent.analyze(PROBLEM, 1);

    expect(search.queries).toEqual([
      { query: `Why does this problem occur: ${PROBLEM}?`, options: { searchDepth: 'advanced', maxResults: 3 } },
    ]);
    const system = llm.callsFor('cause_analysis')[0]?.messages[0]?.content ?? '';
    expect(system).toContain('Web research related to the current question:\n- result a\n- result c\n- result d');
  });

  it('truncates long search queries', async () => {
    const search = new StaticSearchClient({ results: [] });
    const { agent } = await buildAgent(baseScript(), { search, config: { webSearch: { maxQueryLength: 10 } } });

    await agent.analyze(PROBLEM, 1);

    expect(search.queries[0]?.query).toBe('Why does t');
  });

  it('records a failed search and continues', async () => {
    const search = new StaticSearchClient(new Error('quota exceeded'));
    const { agent } = await buildAgent(baseScript(), { search });

    const result = await agent.analyze(PROBLEM, 1);

    expect(result.errors).toEqual(['Web search failed: quota exceeded']);
    expect(result.whyChain).toHaveLength(1);
    expect(result.stopReason).toBe('max_whys_reached');
  });

  it('does not call the search client when search is disabled', async () => {
    const search = new StaticSearchClient({ results: [{ content: 'unused', score: 1 }] });
    const { agent, llm } = await buildAgent(baseScript(), { search, config: { webSearch: { enabled: false } } });

    await agent.analyze(PROBLEM, 1);

    expect(search.queries).toEqual([]);
    expect(llm.callsFor('cause_analysis')[0]?.messages[0]?.content).toContain('(no web results)');
  });

  it('stops between steps once aborted', async () => {
    const controller = new AbortController();
    const { agent } = await buildAgent(
      baseScript({
        cause_analysis: () => {
          controller.abort();
          return causeAnalysis('Cause 1');
        },
      })
    );

    await expect(agent.analyze(PROBLEM, 3, { signal: controller.signal })).rejects.toBeInstanceOf(RunAbortedError);
  });

  it('writes the run lifecycle to the run log', async () => {
    const logsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'insight-five-whys-'));
    const runLogger = new RunLogger(logsDir);
    const { agent } = await buildAgent(baseScript({ validation: [new Error('bad json')] }), { runLogger });

    await agent.analyze(PROBLEM, 1, { runId: 'run-test' });

    const log = runLogger.readRunLog('run-test') ?? '';
    expect(log).toContain('RUN STARTED - FIVE-WHYS');
    expect(log).toContain('NODE 1: entry');
    expect(log).toContain('ERROR in validation: Failed to parse validation response: bad json');
    expect(log).toContain('RUN COMPLETED');
  });
});

describe('FiveWhysAgent.start', () => {
  it('reports progress and the rendered result through the sinks', async () => {
    const { agent } = await buildAgent(baseScript());
    const onCompleted = vi.fn();
    const onProgress = vi.fn();
    const onEvent = vi.fn();

    const handle = agent.start(PROBLEM, { runId: 'run-start', parameters: { maxWhys: 1 } }, { onCompleted, onProgress, onEvent });

    await expect(handle.completion).resolves.toBe(true);
    expect(handle.runId).toBe('run-start');
    expect(onProgress).toHaveBeenNthCalledWith(1, { node: 'entry', step: 1 });
    expect(onEvent).toHaveBeenNthCalledWith(1, { level: 'info', message: 'node:entry' });
    const output: unknown = onCompleted.mock.calls[0]?.[0];
    expect(output).toContain('Root Cause: Cause 1');
    expect(output).toContain('Stop Reason: max_whys_reached');
  });

  it('fails the handle on invalid parameters', async () => {
    const { agent } = await buildAgent(baseScript());
    const onFailed = vi.fn();

    const handle = agent.start(PROBLEM, { parameters: { maxWhys: -2 } }, { onFailed });

    await expect(handle.completion).resolves.toBe(false);
    expect(onFailed).toHaveBeenCalledTimes(1);
  });
});

describe('whyQuestionNode', () => {
  it('refuses a follow-up question without a previous answer', async () => {
    const prompts = await loadPromptLibrary(FIVE_WHYS_PROMPT_DIR);
    const state = createInitialState(PROBLEM, 5);
    state.whyLevel = 1;

    expect(() =>
      whyQuestionNode(state, { llm: new ScriptedLlmClient(), prompts, config: resolveFiveWhysConfig() })
    ).toThrow(PreconditionViolationError);
  });
});
