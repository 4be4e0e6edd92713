import { OpenAI, type ClientOptions } from 'openai';
import { isUsableKey, PLACEHOLDER_KEYS } from './config.js';
import {
  AuthConfigurationError,
  InvalidIdeaError,
  ModelAuthenticationError,
  ModelServiceError,
  PitchDeckError,
  RateLimitError,
  errorMessage,
} from './errors.js';
import { SECTION_ORDER, type Credentials, type JsonObject, type ModelConfig, type PitchDeck } from './types.js';

export const FALLBACK_SECTION_TEXT = 'Failed to generate content. Please try again.';

const SYSTEM_PROMPT =
  'You are a helpful assistant that responds with valid JSON only. Do not include any explanatory text, markdown formatting, or code blocks in your response.';

export interface GenerationResult {
  deck: PitchDeck;
  rawReply: string;
  usedFallback: boolean;
  parseError?: string;
}

export interface ContentGeneratorOptions {
  model: ModelConfig;
  /** Replaces the HTTP transport of the OpenAI client */
  fetch?: ClientOptions['fetch'];
}

/**
 * Prompt sent as the user message; depends only on the idea
 */
export function buildPitchDeckPrompt(idea: string): string {
  return `Generate a JSON object for a startup pitch deck based on the idea: '${idea.trim()}'.
Include keys: ${SECTION_ORDER.join(', ')}.
Make sure the output is strictly valid JSON without any markdown formatting or explanatory text.
The response should be a valid JSON object that can be parsed directly.`;
}

/**
 * Deck substituted when the model reply cannot be used: every section holds the same notice
 */
export function createFallbackDeck(): PitchDeck {
  const deck: JsonObject = {};
  for (const section of SECTION_ORDER) {
    deck[section] = FALLBACK_SECTION_TEXT;
  }
  return Object.freeze(deck);
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Literals such as 1e400 parse to Infinity, which JSON.stringify would write back as null
function rejectNonFinite(key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new SyntaxError(`Number out of range${key ? ` at "${key}"` : ''}`);
  }
  return value;
}

/**
 * Parse the model reply. Only a JSON object with finite numbers is accepted; anything else
 * gives the fallback deck.
 */
export function parsePitchDeck(rawReply: string): GenerationResult {
  try {
    const parsed: unknown = JSON.parse(rawReply, rejectNonFinite);
    if (!isJsonObject(parsed)) {
      throw new SyntaxError(`Expected a JSON object, got ${Array.isArray(parsed) ? 'an array' : typeof parsed}`);
    }
    return { deck: Object.freeze(parsed), rawReply, usedFallback: false };
  } catch (error) {
    return {
      deck: createFallbackDeck(),
      rawReply,
      usedFallback: true,
      parseError: errorMessage(error),
    };
  }
}

export class ContentGenerator {
  private readonly model: ModelConfig;
  private readonly fetchImpl?: ClientOptions['fetch'];

  constructor(options: ContentGeneratorOptions) {
    this.model = options.model;
    this.fetchImpl = options.fetch;
  }

  /**
   * Generate the deck content for an idea
   */
  async generate(idea: string, credentials: Credentials): Promise<PitchDeck> {
    const result = await this.generateWithDiagnostics(idea, credentials);
    return result.deck;
  }

  /**
   * Same as generate(), but also returns the raw reply and whether the fallback deck was used
   */
  async generateWithDiagnostics(idea: string, credentials: Credentials): Promise<GenerationResult> {
    if (!idea || idea.trim() === '') {
      throw new InvalidIdeaError('Please enter a valid startup idea.');
    }

    const apiKey = credentials.modelApiKey;
    if (!isUsableKey(apiKey, PLACEHOLDER_KEYS[this.model.provider])) {
      throw new AuthConfigurationError(
        `${this.providerName()} API key is not set. Please set a valid API key.`
      );
    }

    const client = new OpenAI({
      apiKey,
      baseURL: this.model.baseURL,
      maxRetries: 0,
      fetch: this.fetchImpl,
    });

    let rawReply: string;
    try {
      console.log(`[🧠] Generating content with ${this.model.label}...`);
      const completion = await client.chat.completions.create({
        model: this.model.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildPitchDeckPrompt(idea) },
        ],
        stream: false,
        max_tokens: 4096,
        temperature: 0.7,
        top_p: 1,
        presence_penalty: 0,
        frequency_penalty: 0,
        response_format: { type: 'json_object' },
      });
      rawReply = completion.choices[0]?.message.content ?? '';
    } catch (error) {
      throw this.toPitchDeckError(error);
    }

    console.log(`\n--- Raw Model Output ---\n${rawReply}\n`);

    const result = parsePitchDeck(rawReply);
    if (result.usedFallback) {
      console.error(`[❌] Failed to parse JSON response: ${result.parseError}`);
    } else {
      console.log(`[✓] Content generated successfully!`);
    }
    return result;
  }

  private providerName(): string {
    return this.model.provider === 'openrouter' ? 'OpenRouter' : 'Novita AI';
  }

  private toPitchDeckError(error: unknown): PitchDeckError {
    const provider = this.providerName();

    if (error instanceof OpenAI.AuthenticationError) {
      console.error(`[❌] Authentication error: ${error.message}`);
      return new ModelAuthenticationError(
        `Invalid API key. Please check your ${provider} API key and try again.`,
        { cause: error }
      );
    }
    if (error instanceof OpenAI.RateLimitError) {
      console.error(`[❌] Rate limit exceeded: ${error.message}`);
      return new RateLimitError('API rate limit exceeded. Please try again later.', { cause: error });
    }
    if (error instanceof OpenAI.APIError) {
      console.error(`[❌] API error: ${error.message}`);
      return new ModelServiceError(
        `An error occurred with the ${provider} API. Please try again later.`,
        { cause: error }
      );
    }

    console.error(`[❌] Unexpected error:`, error);
    return new PitchDeckError(
      `An unexpected error occurred: ${errorMessage(error)}. Please try again.`,
      { cause: error }
    );
  }
}
