/**
 * Pitch Deck Generator - Library Usage Examples
 *
 * Shows how a front end (web form, bot, script) drives the pipeline
 */

import { config as loadEnv } from 'dotenv';
import { readCredentials, readModelConfig } from '../src/config.js';
import {
  ContentGenerator,
  DeckAssembler,
  ImageLookup,
  SECTION_ORDER,
  runPitchDeck,
} from '../src/pipeline.js';

loadEnv();

// ============================================================================
// EXAMPLE 1: One call, status message back (what a web form needs)
// ============================================================================

async function example1_singleCall() {
  console.log('=== Example 1: Single Call ===\n');

  const model = readModelConfig();
  const result = await runPitchDeck({
    idea: 'A subscription box for artisanal coffee',
    credentials: readCredentials(model.provider),
    model,
  });

  console.log(result.status);
  if (result.documentPath) {
    console.log(`PDF:  ${result.documentPath}`);
    console.log(`JSON: ${result.jsonPath}\n`);
  }
}

// ============================================================================
// EXAMPLE 2: Inspect the content before rendering
// ============================================================================

async function example2_inspectThenRender() {
  console.log('=== Example 2: Inspect Then Render ===\n');

  const model = readModelConfig();
  const credentials = readCredentials(model.provider);
  const idea = 'Peer-to-peer rental marketplace for camping gear';

  const generator = new ContentGenerator({ model });
  const { deck, usedFallback, rawReply } = await generator.generateWithDiagnostics(idea, credentials);

  if (usedFallback) {
    console.log(`Model reply was not JSON, first 200 chars:\n${rawReply.slice(0, 200)}\n`);
  }

  const missing = SECTION_ORDER.filter(section => !(section in deck));
  console.log(`Missing sections: ${missing.length > 0 ? missing.join(', ') : 'none'}`);

  // Render without photos by leaving out the Unsplash key
  const assembler = new DeckAssembler({
    outputDirectory: './output',
    modelLabel: model.label,
    imageLookup: new ImageLookup(),
  });
  const { documentPath } = await assembler.assemble(deck, `${idea} (draft)`, { modelApiKey: credentials.modelApiKey });
  console.log(`Draft written to ${documentPath}\n`);
}

async function main() {
  await example1_singleCall();
  await example2_inspectThenRender();
}

main().catch(error => {
  console.error('❌ Example failed:', error);
  process.exit(1);
});
