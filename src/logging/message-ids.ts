import type { LogEntry } from '../types.js';

// Stable MESSAGE_IDs (UUIDs) for well-known log events.
const MESSAGE_ID_REGISTRY: Partial<Record<string, string>> = {
  'runner:start': '3b9d5e0a-6c1f-4f7e-9a52-1d8e2c4b7f60',
  'runner:task': 'a7c2e914-2b5d-4c8a-8f13-6e0d9b4a1c27',
  'runner:summary': 'd41f8b36-9e27-4a0c-b5d8-73c1e6f2a9b4',
  'runner:abort': '5e8a0c72-1f4b-4d93-a6e7-2c9b8d1f3e05',
  'a2a:discovery': 'c0f3a6d1-8b42-4e9f-9d17-5a2e7c3b6f18',
  'dataset:init': '92e6b1f4-3d0a-4c75-8e2b-b7f5a1d9c463',
};

export function resolveMessageId(entry: LogEntry): string | undefined {
  const normalized = entry.remoteIdentifier.trim();
  if (normalized.length === 0) return undefined;
  const direct = MESSAGE_ID_REGISTRY[normalized];
  if (direct !== undefined) return direct;
  // Identifiers with a suffix (dataset:init:foo) fall back to their base prefix
  const prefix = normalized.split(':', 2).join(':');
  return MESSAGE_ID_REGISTRY[prefix];
}
