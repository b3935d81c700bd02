import { z } from 'zod';

import { describeError, isPlainObject } from '../utils.js';

export const AGENT_CARD_PATH = '/.well-known/agent-card.json';
export const METHOD_SEND_MESSAGE = 'message/send';
export const METHOD_GET_TASK = 'tasks/get';

export const AgentCardSchema = z.object({
  url: z.string().optional(),
}).passthrough();

export type AgentCard = z.infer<typeof AgentCardSchema>;

const JsonRpcErrorSchema = z.object({
  code: z.number().optional(),
  message: z.string().optional(),
  data: z.unknown().optional(),
}).passthrough();

export const JsonRpcResponseSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: JsonRpcErrorSchema.optional(),
}).passthrough();

export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;

const TaskStatusSchema = z.object({
  state: z.string().optional(),
  message: z.unknown().optional(),
  error: z.unknown().optional(),
}).passthrough();

export const TaskSchema = z.object({
  kind: z.string().optional(),
  id: z.string().min(1),
  status: TaskStatusSchema.optional(),
  artifacts: z.array(z.unknown()).optional(),
  result: z.unknown().optional(),
}).passthrough();

export type A2ATask = z.infer<typeof TaskSchema>;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: string;
  method: string;
  params: Record<string, unknown>;
}

export const SUCCESS_STATE = 'completed';

// input-required / auth-required cannot be satisfied by a non-interactive runner.
export const FAILURE_STATES: ReadonlySet<string> = new Set([
  'failed',
  'canceled',
  'rejected',
  'input-required',
  'auth-required',
]);

export function isTerminalState(state: string | undefined): boolean {
  if (state === undefined) return false;
  return state === SUCCESS_STATE || FAILURE_STATES.has(state);
}

export function buildUserMessage(text: string, messageId: string): Record<string, unknown> {
  return {
    role: 'user',
    parts: [{ kind: 'text', text }],
    messageId,
  };
}

function collectTextParts(parts: unknown): string | undefined {
  if (!Array.isArray(parts)) return undefined;
  const texts = parts.reduce<string[]>((acc, part) => {
    if (!isPlainObject(part) || part.kind !== 'text') return acc;
    const { text } = part;
    if (typeof text === 'string' && text.length > 0) acc.push(text);
    return acc;
  }, []);
  return texts.length > 0 ? texts.join('\n') : undefined;
}

export function extractTextFromMessage(message: unknown): string | undefined {
  if (!isPlainObject(message)) return undefined;
  const fromParts = collectTextParts(message.parts);
  if (fromParts !== undefined) return fromParts;
  if (message.content !== undefined && message.content !== null) {
    return typeof message.content === 'string' ? message.content : describeError(message.content);
  }
  return undefined;
}

export function extractTextFromTask(task: A2ATask): string | undefined {
  const artifacts = task.artifacts ?? [];
  if (artifacts.length > 0) {
    const first = artifacts[0];
    if (isPlainObject(first)) {
      const fromArtifact = collectTextParts(first.parts);
      if (fromArtifact !== undefined) return fromArtifact;
    }
  }

  const { result } = task;
  if (typeof result === 'string') return result;
  if (isPlainObject(result)) {
    if (result.message !== undefined) {
      const fromMessage = extractTextFromMessage(result.message);
      if (fromMessage !== undefined) return fromMessage;
    }
    if (typeof result.text === 'string') return result.text;
    if (typeof result.content === 'string') return result.content;
  }

  return extractTextFromMessage(task.status?.message);
}

export function describeTaskFailure(task: A2ATask): string {
  const state = task.status?.state ?? 'unknown';
  const error = task.status?.error;
  const detail = error !== undefined && error !== null
    ? describeError(error)
    : extractTextFromMessage(task.status?.message);
  return detail !== undefined && detail.length > 0
    ? `task ${task.id} ${state}: ${detail}`
    : `task ${task.id} ${state}`;
}
