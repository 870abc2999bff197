import { v4 as uuidv4 } from 'uuid';
import type { AgentRuntime, TurnResult } from '../agents/runtime.js';
import type { ChatResponse } from '../types/index.js';
import { ForbiddenError, NotFoundError, ValidationError } from '../utils/errors.js';
import type { AgentSession, ISessionStore } from './session-store.js';

export interface AgentMetrics {
  messageCount: number;
  errorCount: number;
  toolCallCount: number;
  averageResponseTime: number;
  inFlightSessions: number;
}

export interface TranscriptEntry {
  role: 'user' | 'model';
  text: string;
}

/**
 * Owns chat sessions: loads them from the store, runs each message through
 * the agent runtime and writes them back. Messages on one session run one at
 * a time, in arrival order.
 */
export class AgentManager {
  private readonly sessionLocks: Map<string, Promise<void>> = new Map();
  private messageCount = 0;
  private errorCount = 0;
  private toolCallCount = 0;
  private totalResponseTime = 0;

  constructor(
    private readonly runtime: AgentRuntime,
    private readonly store: ISessionStore,
    private readonly sessionTtlSeconds: number
  ) {}

  private async withSessionLock<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.sessionLocks.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.sessionLocks.set(sessionId, tail);

    try {
      return await run;
    } finally {
      if (this.sessionLocks.get(sessionId) === tail) {
        this.sessionLocks.delete(sessionId);
      }
    }
  }

  private newSession(sessionId: string, engineerId: string): AgentSession {
    const now = new Date().toISOString();
    return {
      sessionId,
      engineerId,
      activeAgent: this.runtime.rootAgentName,
      history: [],
      state: {},
      createdAt: now,
      updatedAt: now,
    };
  }

  private async loadOwned(engineerId: string, sessionId: string): Promise<AgentSession | null> {
    const session = await this.store.getSession(sessionId);
    if (session && session.engineerId !== engineerId) {
      throw new ForbiddenError(`Session ${sessionId} belongs to another engineer`);
    }
    return session;
  }

  async processMessage(engineerId: string, message: string, sessionId?: string): Promise<ChatResponse> {
    if (!message.trim()) {
      throw new ValidationError('message is required');
    }
    const id = sessionId ?? uuidv4();

    return this.withSessionLock(id, async () => {
      const session = (await this.loadOwned(engineerId, id)) ?? this.newSession(id, engineerId);
      const startTime = Date.now();

      let result: TurnResult;
      try {
        result = await this.runtime.runTurn(session, message.trim());
      } catch (error) {
        this.errorCount++;
        throw error;
      }

      session.updatedAt = new Date().toISOString();
      await this.store.saveSession(session, this.sessionTtlSeconds);

      const processingTime = Date.now() - startTime;
      this.messageCount++;
      this.toolCallCount += result.toolCalls.length;
      this.totalResponseTime += processingTime;

      return {
        session_id: id,
        reply: result.reply,
        agent: result.agent,
        mode: 'agent',
        tool_calls: result.toolCalls,
        processing_time: processingTime,
      };
    });
  }

  /** User and model text of a session, without tool traffic. */
  async getTranscript(engineerId: string, sessionId: string): Promise<TranscriptEntry[]> {
    const session = await this.loadOwned(engineerId, sessionId);
    if (!session) {
      throw new NotFoundError(`Session ${sessionId} not found`);
    }

    const transcript: TranscriptEntry[] = [];
    for (const content of session.history) {
      const text = (content.parts ?? [])
        .map((part) => part.text ?? '')
        .join('')
        .trim();
      if (text) {
        transcript.push({ role: content.role === 'model' ? 'model' : 'user', text });
      }
    }
    return transcript;
  }

  async endSession(engineerId: string, sessionId: string): Promise<boolean> {
    return this.withSessionLock(sessionId, async () => {
      const session = await this.loadOwned(engineerId, sessionId);
      return session ? this.store.removeSession(sessionId) : false;
    });
  }

  getMetrics(): AgentMetrics {
    return {
      messageCount: this.messageCount,
      errorCount: this.errorCount,
      toolCallCount: this.toolCallCount,
      averageResponseTime: this.messageCount > 0 ? this.totalResponseTime / this.messageCount : 0,
      inFlightSessions: this.sessionLocks.size,
    };
  }

  getStatus(): { agents: string[]; metrics: AgentMetrics } {
    return {
      agents: this.runtime.agentNames(),
      metrics: this.getMetrics(),
    };
  }
}
