#!/usr/bin/env node

import { config as loadEnv } from 'dotenv';
import {
  PLACEHOLDER_KEYS,
  isUsableKey,
  readCredentials,
  readModelConfig,
  readOutputDirectory,
} from './config.js';
import { PitchDeckError } from './errors.js';
import { generatePitchDeck } from './pipeline.js';
import { exitOnInterrupt, promptMissing } from './prompt.js';

// Load environment variables
loadEnv();

/**
 * Main processing function
 */
async function main() {
  console.log('📊 Pitch Deck Generator - PDF Edition 📊');
  console.log('===========================================\n');

  const model = readModelConfig();
  const outputDirectory = readOutputDirectory();

  const { idea, credentials } = await promptMissing(
    process.argv.slice(2).join(' ').trim(),
    readCredentials(model.provider),
    model
  );

  if (!idea) {
    console.error('❌ Error: Please enter a valid startup idea.');
    console.error('Usage: pitch-deck "<your startup idea>"');
    process.exit(1);
  }

  console.log('📁 Configuration:');
  console.log(`   Model: ${model.model} (${model.baseURL})`);
  console.log(`   Output Directory: ${outputDirectory}`);
  console.log(`   Unsplash Images: ${isUsableKey(credentials.imageAccessKey, PLACEHOLDER_KEYS.unsplash) ? 'Enabled 🖼️' : 'Disabled'}`);
  console.log('\n🚀 Generating your pitch deck...\n');

  const result = await generatePitchDeck({ idea, credentials, model, outputDirectory });

  console.log('\n✨ All done! Your pitch deck has been created successfully.');
  console.log(`📄 You can find your PDF at: ${result.documentPath}`);
  console.log(`🗂️  Structured content: ${result.jsonPath}\n`);
}

process.on('SIGINT', exitOnInterrupt);

main().catch(error => {
  if (error instanceof PitchDeckError) {
    console.error(`\n❌ Error: ${error.message}`);
  } else {
    console.error('\n❌ An unexpected error occurred:', error);
    console.error('Please try again or report this issue.');
  }
  process.exit(1);
});
