import type { FunctionDeclaration } from '@google/genai';

export type ToolResult = Record<string, unknown>;

/**
 * What a tool can see of the conversation. The engineer id always comes from
 * the session, never from model arguments.
 */
export interface ToolContext {
  engineerId: string;
  sessionId: string;
  state: Record<string, string>;
}

export interface AgentTool {
  declaration: FunctionDeclaration;
  execute(args: Record<string, unknown>, context: ToolContext): Promise<ToolResult>;
}

export interface AgentDefinition {
  name: string;
  description: string;
  /** May contain `{state_key}` placeholders filled from session state. */
  instruction: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  tools: AgentTool[];
  subAgents: AgentDefinition[];
  /** Runs once per session before the first model call. */
  beforeAgent?: (context: ToolContext) => Promise<void>;
}
