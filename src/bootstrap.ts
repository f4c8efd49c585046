import Anthropic from '@anthropic-ai/sdk';
import type Redis from 'ioredis';
import { config, Config } from './config';
import { SymptomCatalog } from './domain/catalog/service';
import { LlmExtractor } from './domain/extraction/llm';
import { RuleBasedExtractor } from './domain/extraction/rule-based';
import type { Extractor } from './domain/extraction/types';
import { CompletionSink, IntakeEngine } from './domain/intake/engine';
import type { IntakePolicy } from './domain/intake/types';
import { InMemorySessionStore, RedisSessionStore, SessionStore } from './domain/session/store';
import { logAIUsage, logger } from './infra/logging/logger';
import { RateLimiter } from './shared/rate-limiter';

export function policyFromConfig(cfg: Config): IntakePolicy {
  return {
    minFollowUps: cfg.minFollowUps,
    demographicRetryCap: cfg.demographicRetryCap,
    symptomClarifications: cfg.symptomClarifications,
    categoryCaps: {
      red_flag: cfg.categoryCapRedFlag,
      detail: cfg.categoryCapDetail,
      vital_sign: cfg.categoryCapVitalSign,
    },
    extractionTimeoutMs: cfg.extractionTimeoutMs,
    maxSaveAttempts: 3,
  };
}

function buildExtractor(catalog: SymptomCatalog): Extractor {
  if (config.extractor === 'rules') {
    return new RuleBasedExtractor(catalog.terms());
  }

  const anthropic = new Anthropic({ apiKey: config.anthropicApiKey });

  return new LlmExtractor({
    client: {
      create: (body, options) => anthropic.messages.create(body, options),
    },
    model: config.extractionModel,
    rateLimiter: new RateLimiter({ maxRequestsPerMinute: config.extractionRpmLimit }),
    onUsage: (usage) => logAIUsage(usage),
  });
}

function buildStore(redis: Redis): SessionStore {
  if (config.sessionStore === 'memory') {
    logger.warn('Using in-memory session store; sessions are lost on restart');
    return new InMemorySessionStore();
  }

  return new RedisSessionStore(
    {
      eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args),
      hget: (key, field) => redis.hget(key, field),
    },
    config.sessionTtlSeconds
  );
}

export interface IntakeRuntime {
  engine: IntakeEngine;
  catalog: SymptomCatalog;
  extractor: Extractor;
}

/**
 * Wire the engine from configuration. Shared by the API and the worker.
 */
export function buildIntakeRuntime(redis: Redis, completionSink: CompletionSink): IntakeRuntime {
  const catalog = SymptomCatalog.fromFile(config.catalogPath);
  const extractor = buildExtractor(catalog);

  const engine = new IntakeEngine({
    store: buildStore(redis),
    extractor,
    catalog,
    completionSink,
    policy: policyFromConfig(config),
    logger,
  });

  logger.info(
    { symptoms: catalog.size, extractor: extractor.name, sessionStore: config.sessionStore },
    'Intake engine ready'
  );

  return { engine, catalog, extractor };
}
