import { expect } from 'chai';
import { AgentRuntime, LOOP_LIMIT_REPLY } from '../agents/runtime.js';
import { MISSING_STATE_VALUE, renderInstruction } from '../agents/template.js';
import type { AgentDefinition, AgentTool } from '../agents/types.js';
import type { AgentSession } from '../services/session-store.js';
import { ScriptedModelClient, rejectionOf, type ScriptedStep } from './fakes.js';

const echo: AgentTool = {
  declaration: { name: 'echo', description: 'Echo text back.' },
  async execute(args) {
    return { status: 'success', echoed: args['text'] };
  },
};

const boom: AgentTool = {
  declaration: { name: 'boom', description: 'Always fails.' },
  async execute() {
    throw new Error('kaput');
  },
};

function buildTree(onStart?: AgentDefinition['beforeAgent']): AgentDefinition {
  return {
    name: 'root',
    description: 'Routes requests.',
    instruction: 'Root agent for {engineer_full_name}.',
    tools: [],
    beforeAgent: onStart,
    subAgents: [
      { name: 'helper', description: 'Helps.', instruction: 'Helper agent.', tools: [echo, boom], subAgents: [] },
      { name: 'other', description: 'Other things.', instruction: 'Other agent.', tools: [], subAgents: [] },
    ],
  };
}

function newSession(activeAgent = 'root'): AgentSession {
  return {
    sessionId: 'session-1',
    engineerId: 'eng-1',
    activeAgent,
    history: [],
    state: {},
    createdAt: '2025-11-06T04:30:00.000Z',
    updatedAt: '2025-11-06T04:30:00.000Z',
  };
}

function runtimeWith(script: ScriptedStep[], tree = buildTree(), maxModelCalls?: number) {
  const model = new ScriptedModelClient(script);
  const runtime = new AgentRuntime(tree, model, {
    model: 'test-model',
    temperature: 0.2,
    maxOutputTokens: 512,
    globalInstruction: 'Engineer id: {engineer_id}.',
    maxModelCalls,
  });
  return { model, runtime };
}

function functionResponses(session: AgentSession, index: number): unknown[] {
  return (session.history[index]?.parts ?? []).map((part) => part.functionResponse?.response);
}

describe('renderInstruction', () => {
  it('fills known keys and marks unknown ones', () => {
    expect(renderInstruction('Hi {name}, today is {current_date}. {Unchanged}', { name: 'Asha' })).to.equal(
      `Hi Asha, today is ${MISSING_STATE_VALUE}. {Unchanged}`
    );
  });
});

describe('AgentRuntime', () => {
  it('lists transfer targets as children, parent and siblings', () => {
    const { runtime } = runtimeWith([]);
    expect(runtime.transferTargets('root')).to.deep.equal(['helper', 'other']);
    expect(runtime.transferTargets('helper')).to.deep.equal(['root', 'other']);
  });

  it('runs tool calls until the model answers in text', async () => {
    const { runtime } = runtimeWith([{ calls: [{ name: 'echo', args: { text: 'hi' } }] }, { text: 'All done.' }]);
    const session = newSession('helper');

    const result = await runtime.runTurn(session, 'Say hi');

    expect(result).to.deep.equal({ reply: 'All done.', agent: 'helper', toolCalls: ['echo'] });
    expect(session.history.map((content) => content.role)).to.deep.equal(['user', 'model', 'user', 'model']);
    expect(functionResponses(session, 2)).to.deep.equal([{ status: 'success', echoed: 'hi' }]);
  });

  it('transfers to a sub-agent and continues with its tools', async () => {
    const { runtime, model } = runtimeWith([
      { calls: [{ name: 'transfer_to_agent', args: { agent_name: 'helper' } }] },
      { text: 'Helper here.' },
    ]);
    const session = newSession();

    const result = await runtime.runTurn(session, 'I need help');

    expect(result.agent).to.equal('helper');
    expect(session.activeAgent).to.equal('helper');
    const [first, second] = model.requests;
    expect(first?.functionDeclarations.map((declaration) => declaration.name)).to.deep.equal(['transfer_to_agent']);
    expect(first?.functionDeclarations[0]?.parameters?.properties?.['agent_name']?.enum).to.deep.equal(['helper', 'other']);
    expect(second?.functionDeclarations.map((declaration) => declaration.name)).to.deep.equal([
      'echo',
      'boom',
      'transfer_to_agent',
    ]);
    expect(second?.systemInstruction).to.equal(`Engineer id: ${MISSING_STATE_VALUE}.\n\nHelper agent.`);
  });

  it('refuses a transfer to an agent that is not a neighbour', async () => {
    const { runtime } = runtimeWith([
      { calls: [{ name: 'transfer_to_agent', args: { agent_name: 'elsewhere' } }] },
      { text: 'Staying put.' },
    ]);
    const session = newSession('helper');

    await runtime.runTurn(session, 'Move');

    expect(session.activeAgent).to.equal('helper');
    expect(functionResponses(session, 2)).to.deep.equal([
      { status: 'error', message: 'Cannot transfer from helper to elsewhere.' },
    ]);
  });

  it('returns tool failures and unknown tools to the model as errors', async () => {
    const { runtime } = runtimeWith([{ calls: [{ name: 'boom' }, { name: 'nope' }] }, { text: 'Sorry about that.' }]);
    const session = newSession('helper');

    const result = await runtime.runTurn(session, 'Break something');

    expect(result.reply).to.equal('Sorry about that.');
    expect(result.toolCalls).to.deep.equal(['boom', 'nope']);
    expect(functionResponses(session, 2)).to.deep.equal([
      { status: 'error', message: 'kaput' },
      { status: 'error', message: 'Tool nope is not available to helper.' },
    ]);
  });

  it('stops after the model call limit with an apology', async () => {
    const { runtime, model } = runtimeWith(
      [{ calls: [{ name: 'echo', args: { text: 'a' } }] }, { calls: [{ name: 'echo', args: { text: 'b' } }] }],
      buildTree(),
      2
    );
    const session = newSession('helper');

    const result = await runtime.runTurn(session, 'Loop forever');

    expect(result.reply).to.equal(LOOP_LIMIT_REPLY);
    expect(model.requests).to.have.length(2);
    expect(session.history.at(-1)?.parts?.[0]?.text).to.equal(LOOP_LIMIT_REPLY);
  });

  it('fills instructions from state populated before the first turn only', async () => {
    let starts = 0;
    const tree = buildTree(async ({ state }) => {
      starts++;
      state['engineer_id'] = 'eng-1';
      state['engineer_full_name'] = 'Asha Rao';
    });
    const { runtime, model } = runtimeWith([{ text: 'Hello Asha.' }, { text: 'Again.' }], tree);
    const session = newSession();

    await runtime.runTurn(session, 'Hi');
    await runtime.runTurn(session, 'Hi again');

    expect(starts).to.equal(1);
    expect(model.requests[0]?.systemInstruction).to.equal('Engineer id: eng-1.\n\nRoot agent for Asha Rao.');
    expect(model.requests[1]?.contents).to.have.length(3);
  });

  it('lets model failures propagate to the caller', async () => {
    const { runtime } = runtimeWith([{ error: new Error('model unavailable') }]);
    const error = await rejectionOf(runtime.runTurn(newSession(), 'Hello'));
    expect(error).to.have.property('message', 'model unavailable');
  });
});
