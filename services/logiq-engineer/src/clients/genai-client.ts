import { GoogleGenAI, type Content, type FunctionDeclaration } from '@google/genai';
import { UpstreamError, errorMessage } from '../utils/errors.js';

export interface ModelFunctionCall {
  id?: string;
  name: string;
  args: Record<string, unknown>;
}

export interface ModelRequest {
  model: string;
  systemInstruction: string;
  contents: Content[];
  functionDeclarations: FunctionDeclaration[];
  temperature: number;
  maxOutputTokens: number;
}

export interface ModelReply {
  text: string;
  functionCalls: ModelFunctionCall[];
  /** Model turn to append to the conversation history as-is. */
  content: Content;
}

export interface DocumentSearchRequest {
  model: string;
  query: string;
  fileSearchStore: string;
  systemInstruction?: string;
}

/**
 * The subset of the hosted model the agent runtime depends on.
 */
export interface ModelClient {
  generate(request: ModelRequest): Promise<ModelReply>;
  searchDocuments(request: DocumentSearchRequest): Promise<string>;
}

export interface GenAiOptions {
  apiKey?: string;
  useVertexAi: boolean;
  project?: string;
  location?: string;
}

export class GenAiModelClient implements ModelClient {
  private readonly ai: GoogleGenAI;

  constructor(options: GenAiOptions) {
    this.ai = options.useVertexAi
      ? new GoogleGenAI({ vertexai: true, project: options.project, location: options.location ?? 'us-central1' })
      : new GoogleGenAI({ apiKey: options.apiKey });
  }

  async generate(request: ModelRequest): Promise<ModelReply> {
    try {
      const response = await this.ai.models.generateContent({
        model: request.model,
        contents: request.contents,
        config: {
          systemInstruction: request.systemInstruction,
          temperature: request.temperature,
          maxOutputTokens: request.maxOutputTokens,
          tools: request.functionDeclarations.length > 0 ? [{ functionDeclarations: request.functionDeclarations }] : undefined,
        },
      });

      const functionCalls: ModelFunctionCall[] = [];
      for (const call of response.functionCalls ?? []) {
        if (call.name) {
          functionCalls.push({ id: call.id, name: call.name, args: call.args ?? {} });
        }
      }

      return {
        text: response.text ?? '',
        functionCalls,
        content: response.candidates?.[0]?.content ?? { role: 'model', parts: [{ text: response.text ?? '' }] },
      };
    } catch (error) {
      throw new UpstreamError('genai', `Model request failed: ${errorMessage(error)}`);
    }
  }

  async searchDocuments(request: DocumentSearchRequest): Promise<string> {
    try {
      const response = await this.ai.models.generateContent({
        model: request.model,
        contents: request.query,
        config: {
          systemInstruction: request.systemInstruction,
          tools: [{ fileSearch: { fileSearchStoreNames: [request.fileSearchStore] } }],
        },
      });
      return response.text ?? '';
    } catch (error) {
      throw new UpstreamError('genai', `File search failed: ${errorMessage(error)}`);
    }
  }
}
