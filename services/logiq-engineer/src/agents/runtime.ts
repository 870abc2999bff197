import { Type, type Content, type FunctionDeclaration, type Part } from '@google/genai';
import type { ModelClient, ModelFunctionCall } from '../clients/genai-client.js';
import type { AgentSession } from '../services/session-store.js';
import { errorMessage } from '../utils/errors.js';
import { renderInstruction } from './template.js';
import type { AgentDefinition, AgentTool, ToolContext, ToolResult } from './types.js';

export const TRANSFER_TOOL_NAME = 'transfer_to_agent';
export const LOOP_LIMIT_REPLY =
  "I'm sorry, I couldn't complete that request. Could you rephrase it or break it into smaller steps?";

export interface RuntimeSettings {
  model: string;
  temperature: number;
  maxOutputTokens: number;
  globalInstruction: string;
  maxModelCalls?: number;
}

export interface TurnResult {
  reply: string;
  agent: string;
  toolCalls: string[];
}

interface AgentNode {
  definition: AgentDefinition;
  parent: AgentNode | null;
}

/**
 * Drives one agent tree against the model's function-calling API. A turn
 * keeps calling the model until it answers in text, running tool calls and
 * transfers in between.
 */
export class AgentRuntime {
  private readonly nodes = new Map<string, AgentNode>();
  private readonly maxModelCalls: number;

  constructor(
    private readonly root: AgentDefinition,
    private readonly model: ModelClient,
    private readonly settings: RuntimeSettings
  ) {
    this.maxModelCalls = settings.maxModelCalls ?? 8;
    this.register(root, null);
  }

  private register(definition: AgentDefinition, parent: AgentNode | null): void {
    if (this.nodes.has(definition.name)) {
      throw new Error(`Duplicate agent name: ${definition.name}`);
    }
    const node: AgentNode = { definition, parent };
    this.nodes.set(definition.name, node);
    for (const child of definition.subAgents) {
      this.register(child, node);
    }
  }

  get rootAgentName(): string {
    return this.root.name;
  }

  agentNames(): string[] {
    return Array.from(this.nodes.keys());
  }

  /** Parent, siblings and children of an agent. */
  transferTargets(agentName: string): string[] {
    const node = this.nodes.get(agentName);
    if (!node) {
      return [];
    }
    const targets = new Set<string>(node.definition.subAgents.map((child) => child.name));
    if (node.parent) {
      targets.add(node.parent.definition.name);
      for (const sibling of node.parent.definition.subAgents) {
        if (sibling.name !== agentName) {
          targets.add(sibling.name);
        }
      }
    }
    return Array.from(targets);
  }

  private transferDeclaration(agentName: string): FunctionDeclaration | null {
    const targets = this.transferTargets(agentName);
    if (targets.length === 0) {
      return null;
    }
    const described = targets
      .map((name) => `- ${name}: ${this.nodes.get(name)?.definition.description ?? ''}`)
      .join('\n');

    return {
      name: TRANSFER_TOOL_NAME,
      description: `Hand the conversation to another agent better suited to the request.\n${described}`,
      parameters: {
        type: Type.OBJECT,
        properties: {
          agent_name: { type: Type.STRING, enum: targets, description: 'Name of the agent to transfer to.' },
        },
        required: ['agent_name'],
      },
    };
  }

  private activeNode(session: AgentSession): AgentNode {
    const node = this.nodes.get(session.activeAgent);
    if (node) {
      return node;
    }
    session.activeAgent = this.root.name;
    return this.nodes.get(this.root.name) ?? { definition: this.root, parent: null };
  }

  /**
   * Run one user message through the tree. The session is updated in place.
   */
  async runTurn(session: AgentSession, message: string): Promise<TurnResult> {
    const context: ToolContext = { engineerId: session.engineerId, sessionId: session.sessionId, state: session.state };

    if (session.history.length === 0 && this.root.beforeAgent) {
      await this.root.beforeAgent(context);
    }

    session.history.push({ role: 'user', parts: [{ text: message }] });
    const toolCalls: string[] = [];

    for (let call = 0; call < this.maxModelCalls; call++) {
      const node = this.activeNode(session);
      const agent = node.definition;

      const declarations = agent.tools.map((tool) => tool.declaration);
      const transfer = this.transferDeclaration(agent.name);
      if (transfer) {
        declarations.push(transfer);
      }

      const reply = await this.model.generate({
        model: agent.model ?? this.settings.model,
        systemInstruction: [
          renderInstruction(this.settings.globalInstruction, session.state),
          renderInstruction(agent.instruction, session.state),
        ].join('\n\n'),
        contents: session.history,
        functionDeclarations: declarations,
        temperature: agent.temperature ?? this.settings.temperature,
        maxOutputTokens: agent.maxOutputTokens ?? this.settings.maxOutputTokens,
      });
      session.history.push(reply.content);

      if (reply.functionCalls.length === 0) {
        return { reply: reply.text, agent: agent.name, toolCalls };
      }

      const parts: Part[] = [];
      for (const functionCall of reply.functionCalls) {
        toolCalls.push(functionCall.name);
        const response = await this.dispatch(session, agent, functionCall, context);
        parts.push({ functionResponse: { id: functionCall.id, name: functionCall.name, response } });
      }
      session.history.push({ role: 'user', parts } satisfies Content);
    }

    console.warn(`Session ${session.sessionId} reached ${this.maxModelCalls} model calls without a reply`);
    session.history.push({ role: 'model', parts: [{ text: LOOP_LIMIT_REPLY }] });
    return { reply: LOOP_LIMIT_REPLY, agent: session.activeAgent, toolCalls };
  }

  private async dispatch(
    session: AgentSession,
    agent: AgentDefinition,
    functionCall: ModelFunctionCall,
    context: ToolContext
  ): Promise<ToolResult> {
    if (functionCall.name === TRANSFER_TOOL_NAME) {
      return this.transfer(session, agent, functionCall.args['agent_name']);
    }

    const tool = agent.tools.find((candidate: AgentTool) => candidate.declaration.name === functionCall.name);
    if (!tool) {
      return { status: 'error', message: `Tool ${functionCall.name} is not available to ${agent.name}.` };
    }

    try {
      return await tool.execute(functionCall.args, context);
    } catch (error) {
      console.error(`Tool ${functionCall.name} failed for session ${session.sessionId}:`, errorMessage(error));
      return { status: 'error', message: errorMessage(error) };
    }
  }

  private transfer(session: AgentSession, agent: AgentDefinition, target: unknown): ToolResult {
    if (typeof target !== 'string' || !this.transferTargets(agent.name).includes(target)) {
      return { status: 'error', message: `Cannot transfer from ${agent.name} to ${String(target)}.` };
    }
    session.activeAgent = target;
    return { status: 'success', message: `Transferred to ${target}.` };
  }
}
