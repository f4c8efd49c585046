import { z } from 'zod';
import type { ExtractionContext, Extractor, PartialFieldMap } from './types';
import { ExtractionError, ExtractionMalformedError } from '../../shared/errors';
import { RateLimiter } from '../../shared/rate-limiter';

// ============================================================================
// Model client seam
// ============================================================================

export interface CompletionRequest {
  model: string;
  max_tokens: number;
  temperature?: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

export interface CompletionResponse {
  model: string;
  content: Array<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * The slice of the Anthropic messages API the extractor calls.
 */
export interface MessagesClient {
  create(
    body: CompletionRequest,
    options?: { signal?: AbortSignal; maxRetries?: number }
  ): Promise<CompletionResponse>;
}

export interface ExtractionUsage {
  conversationId: string | null;
  model: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
}

export interface LlmExtractorOptions {
  client: MessagesClient;
  model: string;
  rateLimiter?: RateLimiter;
  onUsage?: (usage: ExtractionUsage) => Promise<void> | void;
}

// ============================================================================
// Response schema
// ============================================================================

const ageSchema = z.union([
  z.number().int(),
  z.string().regex(/^\d{1,3}$/).transform(Number),
]);

// Each key is validated on its own; a bad value drops only that field.
const extractionResponseSchema = z.object({
  name: z.string().nullish().catch(undefined),
  age: ageSchema.nullish().catch(undefined),
  gender: z.string().nullish().catch(undefined),
  email: z.string().nullish().catch(undefined),
  symptom: z.string().nullish().catch(undefined),
});

const SYSTEM_PROMPT = `You extract structured fields from one message a patient sent to a clinic's intake assistant.

Return ONLY a JSON object with these optional keys:
- "name": the patient's own name
- "age": the patient's age in whole years, as a number
- "gender": "male", "female" or "other"
- "email": the patient's email address
- "symptom": a short phrase for the main health complaint, in the patient's words

Rules:
- Omit a key (or use null) when the message does not state it. Never guess.
- Do not infer gender from a name.
- Names of other people (doctors, relatives) are not the patient's name.
- No commentary, no markdown, just the JSON object.`;

// ============================================================================
// LLM Extractor
// ============================================================================

export class LlmExtractor implements Extractor {
  readonly name = 'llm';
  private readonly client: MessagesClient;
  private readonly model: string;
  private readonly rateLimiter: RateLimiter | null;
  private readonly onUsage: LlmExtractorOptions['onUsage'];

  constructor(options: LlmExtractorOptions) {
    this.client = options.client;
    this.model = options.model;
    this.rateLimiter = options.rateLimiter ?? null;
    this.onUsage = options.onUsage;
  }

  async extract(text: string, context: ExtractionContext): Promise<PartialFieldMap> {
    if (this.rateLimiter) {
      await this.rateLimiter.acquire();
    }

    if (context.signal?.aborted) {
      throw new ExtractionError('Extraction aborted', 'EXTRACTION_ABORTED');
    }

    const startTime = Date.now();
    let response: CompletionResponse;

    try {
      response = await this.client.create(
        {
          model: this.model,
          max_tokens: 256,
          temperature: 0,
          system: SYSTEM_PROMPT,
          messages: [{ role: 'user', content: buildUserPrompt(text, context) }],
        },
        // The engine owns the deadline, so no SDK-level retries
        { signal: context.signal, maxRetries: 0 }
      );
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (context.signal?.aborted) {
        throw new ExtractionError('Extraction aborted', 'EXTRACTION_ABORTED', err);
      }
      throw new ExtractionError(`Extraction request failed: ${err.message}`, 'EXTRACTION_FAILED', err);
    }

    if (this.onUsage) {
      await this.onUsage({
        conversationId: context.conversationId ?? null,
        model: response.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        latencyMs: Date.now() - startTime,
      });
    }

    const content = response.content
      .filter(block => block.type === 'text')
      .map(block => block.text ?? '')
      .join('\n');

    return parseExtraction(content);
  }
}

function buildUserPrompt(text: string, context: ExtractionContext): string {
  const lines = [
    `Conversation stage: ${context.status}`,
    `Still needed: ${context.missingFields.length > 0 ? context.missingFields.join(', ') : 'nothing'}`,
  ];
  if (context.lastQuestion) {
    lines.push(`Last question asked: ${context.lastQuestion}`);
  }
  lines.push('', 'Patient message:', text);
  return lines.join('\n');
}

/**
 * Parse the model's reply into a field map. Null, empty and invalid values
 * are dropped so absent fields stay absent. Only a reply that is not a JSON
 * object is malformed.
 */
export function parseExtraction(content: string): PartialFieldMap {
  const stripped = content
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');

  let raw: unknown;
  try {
    raw = JSON.parse(stripped);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    throw new ExtractionMalformedError('response is not JSON', err);
  }

  const result = extractionResponseSchema.safeParse(raw);
  if (!result.success) {
    throw new ExtractionMalformedError(result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
  }

  const fields: PartialFieldMap = {};
  const { name, age, gender, email, symptom } = result.data;

  if (name?.trim()) fields.name = name.trim();
  if (typeof age === 'number') fields.age = age;
  if (gender?.trim()) fields.gender = gender.trim();
  if (email?.trim()) fields.email = email.trim();
  if (symptom?.trim()) fields.symptom = symptom.trim();

  return fields;
}
