import { GroundworkValidationError } from '../errors.js';
import { GroundworkHttpClient } from '../http.js';
import type {
  ChatMessage,
  DeleteSessionResult,
  GetMessagesInput,
  GetMessagesResult,
  ListSessionsInput,
  ListSessionsResult,
  MessageRole,
  SessionSummary,
  VoteFlag,
} from '../types.js';

export interface SessionPayload {
  session_id: string;
  title: string | null;
  message_count: number;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export interface MessagePayload {
  message_id: string;
  session_id: string;
  sequence: number;
  role: MessageRole;
  content: string;
  upvote: VoteFlag;
  downvote: VoteFlag;
  feedback: string | null;
  voted_at: string | null;
  created_at: string;
  updated_at: string;
}

interface ListSessionsResponseEnvelope {
  data: SessionPayload[];
  meta: { limit: number; offset: number; count: number };
}

interface GetMessagesResponseEnvelope {
  data: MessagePayload[];
  meta: { session_id: string; offset: number; count: number };
}

interface DeleteSessionResponseEnvelope {
  deleted: boolean;
  session_id: string;
}

export async function listSessionsMethod(
  http: GroundworkHttpClient,
  input: ListSessionsInput,
): Promise<ListSessionsResult> {
  const response = await http.request<ListSessionsResponseEnvelope>({
    method: 'GET',
    path: '/sessions',
    query: {
      limit: input.limit,
      offset: input.offset,
      include_closed: input.includeClosed,
    },
  });

  return {
    sessions: response.data.map(toSessionSummary),
    limit: response.meta.limit,
    offset: response.meta.offset,
    count: response.meta.count,
  };
}

export async function createSessionMethod(http: GroundworkHttpClient): Promise<SessionSummary> {
  const response = await http.request<{ data: SessionPayload }>({
    method: 'POST',
    path: '/sessions',
  });
  return toSessionSummary(response.data);
}

export async function getSessionMethod(
  http: GroundworkHttpClient,
  sessionId: string,
): Promise<SessionSummary> {
  const id = requireSessionId(sessionId, 'getSession');
  const response = await http.request<{ data: SessionPayload }>({
    method: 'GET',
    path: `/sessions/${encodeURIComponent(id)}`,
  });
  return toSessionSummary(response.data);
}

export async function getMessagesMethod(
  http: GroundworkHttpClient,
  input: GetMessagesInput,
): Promise<GetMessagesResult> {
  const sessionId = requireSessionId(input.sessionId, 'getMessages');
  const response = await http.request<GetMessagesResponseEnvelope>({
    method: 'GET',
    path: `/sessions/${encodeURIComponent(sessionId)}/messages`,
    query: { limit: input.limit, offset: input.offset },
  });

  return {
    sessionId: response.meta.session_id,
    messages: response.data.map(toChatMessage),
    offset: response.meta.offset,
    count: response.meta.count,
  };
}

export async function closeSessionMethod(
  http: GroundworkHttpClient,
  sessionId: string,
): Promise<SessionSummary> {
  const id = requireSessionId(sessionId, 'closeSession');
  const response = await http.request<{ data: SessionPayload }>({
    method: 'POST',
    path: `/sessions/${encodeURIComponent(id)}/close`,
  });
  return toSessionSummary(response.data);
}

export async function deleteSessionMethod(
  http: GroundworkHttpClient,
  sessionId: string,
): Promise<DeleteSessionResult> {
  const id = requireSessionId(sessionId, 'deleteSession');
  const response = await http.request<DeleteSessionResponseEnvelope>({
    method: 'DELETE',
    path: `/sessions/${encodeURIComponent(id)}`,
  });
  return { deleted: response.deleted, sessionId: response.session_id };
}

export function toSessionSummary(payload: SessionPayload): SessionSummary {
  return {
    sessionId: payload.session_id,
    title: payload.title,
    messageCount: payload.message_count,
    isActive: payload.is_active,
    createdAt: payload.created_at,
    updatedAt: payload.updated_at,
  };
}

export function toChatMessage(payload: MessagePayload): ChatMessage {
  return {
    messageId: payload.message_id,
    sessionId: payload.session_id,
    sequence: payload.sequence,
    role: payload.role,
    content: payload.content,
    upvote: payload.upvote,
    downvote: payload.downvote,
    feedback: payload.feedback,
    votedAt: payload.voted_at,
    createdAt: payload.created_at,
    updatedAt: payload.updated_at,
  };
}

function requireSessionId(value: string, method: string): string {
  const id = value.trim();
  if (!id) {
    throw new GroundworkValidationError(`${method}.sessionId is required`, {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }
  return id;
}
