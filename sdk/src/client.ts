import { GroundworkHttpClient } from './http.js';
import { askMethod, askStreamMethod } from './methods/ask.js';
import { chatMethod, chatStreamMethod } from './methods/chat.js';
import { healthMethod } from './methods/health.js';
import {
  closeSessionMethod,
  createSessionMethod,
  deleteSessionMethod,
  getMessagesMethod,
  getSessionMethod,
  listSessionsMethod,
} from './methods/sessions.js';
import { voteMethod } from './methods/vote.js';
import type {
  AskInput,
  AskResult,
  AskStreamEvent,
  ChatInput,
  ChatMessage,
  ChatResult,
  ChatStreamEvent,
  DeleteSessionResult,
  GetMessagesInput,
  GetMessagesResult,
  GroundworkClientConfig,
  HealthResult,
  ListSessionsInput,
  ListSessionsResult,
  SessionSummary,
  VoteInput,
} from './types.js';

export class GroundworkClient {
  private readonly http: GroundworkHttpClient;

  constructor(config: GroundworkClientConfig) {
    if (!config.token || config.token.trim().length === 0) {
      throw new Error('GroundworkClient requires a non-empty token');
    }
    if (!config.baseUrl || config.baseUrl.trim().length === 0) {
      throw new Error('GroundworkClient requires a baseUrl');
    }

    this.http = new GroundworkHttpClient(config);
  }

  async chat(input: ChatInput): Promise<ChatResult> {
    return chatMethod(this.http, input);
  }

  /**
   * Streamed chat: session, retrieval, generation and complete events,
   * then a final `result` event carrying what `chat` would return.
   */
  chatStream(input: ChatInput): AsyncGenerator<ChatStreamEvent, void, undefined> {
    return chatStreamMethod(this.http, input);
  }

  async ask(input: AskInput): Promise<AskResult> {
    return askMethod(this.http, input);
  }

  askStream(input: AskInput): AsyncGenerator<AskStreamEvent, void, undefined> {
    return askStreamMethod(this.http, input);
  }

  async vote(input: VoteInput): Promise<ChatMessage> {
    return voteMethod(this.http, input);
  }

  async createSession(): Promise<SessionSummary> {
    return createSessionMethod(this.http);
  }

  async getSession(sessionId: string): Promise<SessionSummary> {
    return getSessionMethod(this.http, sessionId);
  }

  async listSessions(input: ListSessionsInput = {}): Promise<ListSessionsResult> {
    return listSessionsMethod(this.http, input);
  }

  async getMessages(input: GetMessagesInput): Promise<GetMessagesResult> {
    return getMessagesMethod(this.http, input);
  }

  async closeSession(sessionId: string): Promise<SessionSummary> {
    return closeSessionMethod(this.http, sessionId);
  }

  async deleteSession(sessionId: string): Promise<DeleteSessionResult> {
    return deleteSessionMethod(this.http, sessionId);
  }

  async health(): Promise<HealthResult> {
    return healthMethod(this.http);
  }
}
