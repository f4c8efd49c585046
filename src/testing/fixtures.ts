import path from 'path';
import pino from 'pino';
import { SymptomCatalog } from '../domain/catalog/service';
import type { ExtractionContext, Extractor, PartialFieldMap } from '../domain/extraction/types';
import { RuleBasedExtractor } from '../domain/extraction/rule-based';
import { CompletionSink, IntakeEngine } from '../domain/intake/engine';
import { DEFAULT_POLICY, IntakePolicy, IntakeSnapshot } from '../domain/intake/types';
import { InMemorySessionStore, SessionStore } from '../domain/session/store';

export const CATALOG_PATH = path.join(__dirname, '..', '..', 'data', 'symptom-catalog.json');

export const silentLogger = pino({ level: 'silent' });

export function loadCatalog(): SymptomCatalog {
  return SymptomCatalog.fromFile(CATALOG_PATH);
}

/**
 * Returns queued field maps in order, then empty maps. Records every call.
 */
export class ScriptedExtractor implements Extractor {
  readonly name = 'scripted';
  readonly calls: Array<{ text: string; context: ExtractionContext }> = [];

  constructor(private script: PartialFieldMap[] = []) {}

  async extract(text: string, context: ExtractionContext): Promise<PartialFieldMap> {
    this.calls.push({ text, context });
    return this.script.shift() ?? {};
  }
}

export class FailingExtractor implements Extractor {
  readonly name = 'failing';

  async extract(): Promise<PartialFieldMap> {
    throw new Error('model unavailable');
  }
}

export class HangingExtractor implements Extractor {
  readonly name = 'hanging';
  aborted = false;

  extract(_text: string, context: ExtractionContext): Promise<PartialFieldMap> {
    context.signal?.addEventListener('abort', () => {
      this.aborted = true;
    });
    return new Promise<PartialFieldMap>(() => undefined);
  }
}

export class RecordingSink implements CompletionSink {
  readonly snapshots: IntakeSnapshot[] = [];
  failures = 0;

  async handoff(snapshot: IntakeSnapshot): Promise<void> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('queue unavailable');
    }
    this.snapshots.push(snapshot);
  }
}

/**
 * A clock that advances one second per reading.
 */
export function steppingClock(start: string = '2026-03-02T09:00:00.000Z'): () => Date {
  let tick = 0;
  const base = new Date(start).getTime();
  return () => new Date(base + 1000 * tick++);
}

export interface TestEngine {
  engine: IntakeEngine;
  store: SessionStore;
  sink: RecordingSink;
  catalog: SymptomCatalog;
}

export function buildTestEngine(overrides: {
  extractor?: Extractor;
  store?: SessionStore;
  policy?: Partial<IntakePolicy>;
  catalog?: SymptomCatalog;
} = {}): TestEngine {
  const catalog = overrides.catalog ?? loadCatalog();
  const store = overrides.store ?? new InMemorySessionStore();
  const sink = new RecordingSink();

  const engine = new IntakeEngine({
    store,
    extractor: overrides.extractor ?? new RuleBasedExtractor(catalog.terms()),
    catalog,
    completionSink: sink,
    policy: { ...DEFAULT_POLICY, ...overrides.policy },
    logger: silentLogger,
    now: steppingClock(),
  });

  return { engine, store, sink, catalog };
}
