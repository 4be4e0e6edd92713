import type { ClientOptions } from 'openai';
import { MODEL_PRESETS } from './config.js';
import { ContentGenerator } from './content-generator.js';
import { DeckAssembler } from './deck-assembler.js';
import { errorMessage } from './errors.js';
import { ImageLookup } from './image-lookup.js';
import type { Credentials, ModelConfig, PitchDeckResult } from './types.js';

export interface PitchDeckRequest {
  idea: string;
  credentials: Credentials;
  /** Defaults to the idea */
  title?: string;
  model?: ModelConfig;
  outputDirectory?: string;
  imageLookup?: ImageLookup;
  /** Replaces the HTTP transport of the model client */
  fetch?: ClientOptions['fetch'];
}

export interface PitchDeckFailure {
  documentPath: null;
  jsonPath: null;
  status: string;
}

/**
 * Generate deck content for an idea and write the PDF and JSON files.
 * Throws a PitchDeckError on configuration or model-service failures.
 */
export async function generatePitchDeck(request: PitchDeckRequest): Promise<PitchDeckResult> {
  const model = request.model ?? MODEL_PRESETS.novita;

  const generator = new ContentGenerator({ model, fetch: request.fetch });
  const deck = await generator.generate(request.idea, request.credentials);

  const assembler = new DeckAssembler({
    outputDirectory: request.outputDirectory ?? process.cwd(),
    modelLabel: model.label,
    imageLookup: request.imageLookup,
  });
  const { documentPath, jsonPath } = await assembler.assemble(
    deck,
    request.title ?? request.idea,
    request.credentials
  );

  return {
    documentPath,
    jsonPath,
    status: `✅ Successfully generated pitch deck for: '${request.idea}'`,
  };
}

/**
 * Front-end wrapper: reports every failure as a status message instead of throwing
 */
export async function runPitchDeck(request: PitchDeckRequest): Promise<PitchDeckResult | PitchDeckFailure> {
  try {
    return await generatePitchDeck(request);
  } catch (error) {
    console.error(`[❌] Pitch deck generation failed:`, error);
    return { documentPath: null, jsonPath: null, status: `❌ Error: ${errorMessage(error)}` };
  }
}

export { ContentGenerator, FALLBACK_SECTION_TEXT, buildPitchDeckPrompt } from './content-generator.js';
export { DeckAssembler, sanitizeTitle } from './deck-assembler.js';
export { ImageLookup } from './image-lookup.js';
export * from './errors.js';
export * from './types.js';
