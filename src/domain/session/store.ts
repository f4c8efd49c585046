import { RevisionConflictError, SessionCorruptError } from '../../shared/errors';
import { intakeRecordSchema } from '../intake/schema';
import type { IntakeRecord } from '../intake/types';

/**
 * Durable home of intake records. `save` is a compare-and-swap: it succeeds
 * only when the stored revision is exactly `record.revision - 1` (no stored
 * record counts as revision 0), and throws RevisionConflictError otherwise.
 */
export interface SessionStore {
  load(conversationId: string): Promise<IntakeRecord | null>;
  save(conversationId: string, record: IntakeRecord): Promise<void>;
}

// ============================================================================
// In-memory store (development and tests)
// ============================================================================

export class InMemorySessionStore implements SessionStore {
  private records = new Map<string, string>();

  async load(conversationId: string): Promise<IntakeRecord | null> {
    const raw = this.records.get(conversationId);
    return raw === undefined ? null : parseRecord(conversationId, raw);
  }

  async save(conversationId: string, record: IntakeRecord): Promise<void> {
    const raw = this.records.get(conversationId);
    const current = raw === undefined ? 0 : parseRecord(conversationId, raw).revision;
    const expected = record.revision - 1;

    if (current !== expected) {
      throw new RevisionConflictError(conversationId, expected, raw === undefined ? null : current);
    }

    this.records.set(conversationId, JSON.stringify(record));
  }

  get size(): number {
    return this.records.size;
  }
}

// ============================================================================
// Redis store
// ============================================================================

/**
 * The ioredis commands the store uses.
 */
export interface SessionRedis {
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
  hget(key: string, field: string): Promise<string | null>;
}

// Returns -1 on success, otherwise the stored revision (0 when absent)
const CAS_SAVE_SCRIPT = `
local current = tonumber(redis.call('HGET', KEYS[1], 'revision') or '0')
if current ~= tonumber(ARGV[1]) then
  return current
end
redis.call('HSET', KEYS[1], 'revision', ARGV[2], 'record', ARGV[3])
redis.call('EXPIRE', KEYS[1], ARGV[4])
return -1
`;

const KEY_PREFIX = 'intake:session:';

export class RedisSessionStore implements SessionStore {
  constructor(
    private redis: SessionRedis,
    private ttlSeconds: number
  ) {}

  async load(conversationId: string): Promise<IntakeRecord | null> {
    const raw = await this.redis.hget(KEY_PREFIX + conversationId, 'record');
    return raw === null ? null : parseRecord(conversationId, raw);
  }

  async save(conversationId: string, record: IntakeRecord): Promise<void> {
    const expected = record.revision - 1;
    const result = await this.redis.eval(
      CAS_SAVE_SCRIPT,
      1,
      KEY_PREFIX + conversationId,
      String(expected),
      String(record.revision),
      JSON.stringify(record),
      String(this.ttlSeconds)
    );

    if (result === -1) {
      return;
    }

    const actual = typeof result === 'number' ? result : Number(result);
    throw new RevisionConflictError(conversationId, expected, actual === 0 ? null : actual);
  }
}

function parseRecord(conversationId: string, raw: string): IntakeRecord {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new SessionCorruptError(conversationId, 'not valid JSON');
  }

  const result = intakeRecordSchema.safeParse(value);
  if (!result.success) {
    throw new SessionCorruptError(conversationId, result.error.issues[0]?.message ?? 'schema mismatch');
  }
  return result.data;
}
