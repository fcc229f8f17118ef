export interface GroundworkClientConfig {
  /** Bearer token sent as `Authorization` unless defaultHeaders set one */
  token: string;
  baseUrl: string;
  fetch?: typeof globalThis.fetch;
  defaultHeaders?: Record<string, string>;
  timeoutMs?: number;
}

export type MessageRole = 'user' | 'assistant';
export type VoteFlag = 0 | 1;

export interface ChatTurn {
  role: string;
  content: string;
}

export interface ChatInput {
  /** Shorthand for a single user turn */
  message?: string;
  /** Only the final entry is answered; it must be a user turn */
  messages?: ChatTurn[];
  sessionId?: string;
  signal?: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  model: string;
}

export interface ChatResult {
  answer: string;
  sessionId: string;
  messageId: string;
  userMessageId: string;
  dataPoints: string[];
  thoughts: string;
  query: string;
  usage: TokenUsage;
  retrievalFailed: boolean;
}

/** Stage lines shared by the chat and ask streams */
export type PipelineStageEvent =
  | { type: 'retrieval'; query: string; evidenceCount: number; retrievalFailed: boolean }
  | { type: 'generation'; attempt: number; reducedContext: boolean };

/** One line of a streamed chat; `result` is always last */
export type ChatStreamEvent =
  | { type: 'session'; sessionId: string; userMessageId: string; created: boolean }
  | PipelineStageEvent
  | { type: 'complete'; messageId: string }
  | { type: 'result'; result: ChatResult };

export interface AskInput {
  query: string;
  /** Client counter, echoed back unchanged */
  count?: number;
  signal?: AbortSignal;
}

export interface AskSource {
  title: string;
  source: string;
  relevanceScore: number;
  /** Up to 150 characters, cut at a word break where possible */
  excerpt: string;
}

export interface AskResult {
  query: string;
  answer: string;
  sources: AskSource[];
  count: number;
  approach: string;
  documentsFound: number;
  searchQuery: string;
  usage: TokenUsage;
  retrievalFailed: boolean;
}

export type AskStreamEvent = PipelineStageEvent | { type: 'result'; result: AskResult };

export interface VoteInput {
  sessionId: string;
  messageId: string;
  upvote: VoteFlag;
  downvote: VoteFlag;
  feedback?: string | null;
}

export interface SessionSummary {
  sessionId: string;
  title: string | null;
  messageCount: number;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface ChatMessage {
  messageId: string;
  sessionId: string;
  sequence: number;
  role: MessageRole;
  content: string;
  upvote: VoteFlag;
  downvote: VoteFlag;
  feedback: string | null;
  votedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ListSessionsInput {
  limit?: number;
  offset?: number;
  includeClosed?: boolean;
}

export interface ListSessionsResult {
  sessions: SessionSummary[];
  limit: number;
  offset: number;
  count: number;
}

export interface GetMessagesInput {
  sessionId: string;
  limit?: number;
  offset?: number;
}

export interface GetMessagesResult {
  sessionId: string;
  messages: ChatMessage[];
  offset: number;
  count: number;
}

export interface DeleteSessionResult {
  deleted: boolean;
  sessionId: string;
}

export type HealthStatus = 'ok' | 'degraded' | 'unavailable';

export interface RepositoryHealth {
  state: 'real' | 'fallback';
  backend: string;
  reason?: string;
  consecutiveFailures: number;
}

export interface HealthResult {
  status: HealthStatus;
  timestamp: string;
  store: { kind: string; healthy: boolean };
  repositories: {
    search: RepositoryHealth;
    generation: RepositoryHealth;
  };
}
