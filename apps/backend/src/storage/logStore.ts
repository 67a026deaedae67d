import { existsSync, mkdirSync, appendFileSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import crypto from 'node:crypto';
import { LogEventSchema, type LogEvent, type LogLevel, type LogEventType } from '@quorum-governor/shared';

// ─── Config ──────────────────────────────────────────────

const LOG_DIR = process.env.LOG_STORE_PATH || join(process.cwd(), '.data');
const LOG_FILE = join(LOG_DIR, 'logs.jsonl');

function ensureDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

/** bigint is not JSON; weights and checkpoints are written as decimal strings. */
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function parseLine(line: string): LogEvent | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = LogEventSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { id, timestamp, type, proposalId, payload, level } = parsed.data;
  return { id, timestamp, type, proposalId, payload, level };
}

// ─── Public API ──────────────────────────────────────────

export function serializeLogEvent(event: LogEvent): string {
  return JSON.stringify(event, jsonReplacer);
}

export function appendLog(event: LogEvent): void {
  ensureDir();
  appendFileSync(LOG_FILE, serializeLogEvent(event) + '\n', 'utf-8');
}

export function createLogEvent(
  type: LogEventType,
  payload: unknown,
  level: LogLevel = 'INFO',
  proposalId?: string,
): LogEvent {
  return {
    id: crypto.randomUUID(),
    timestamp: Date.now(),
    type,
    proposalId,
    payload,
    level,
  };
}

/** Latest `limit` events, oldest first. Malformed lines are skipped. */
export function readLatest(limit = 100): LogEvent[] {
  ensureDir();
  if (!existsSync(LOG_FILE)) return [];

  const lines = readFileSync(LOG_FILE, 'utf-8')
    .split('\n')
    .filter(Boolean);

  const start = Math.max(0, lines.length - limit);
  const events: LogEvent[] = [];
  for (let i = start; i < lines.length; i++) {
    const event = parseLine(lines[i]);
    if (event) events.push(event);
  }
  return events;
}

export function readByProposalId(proposalId: string, limit = 10_000): LogEvent[] {
  return readLatest(limit).filter((e) => e.proposalId === proposalId);
}
