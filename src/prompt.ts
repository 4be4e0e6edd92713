import { createInterface } from 'readline/promises';
import { PLACEHOLDER_KEYS, isUsableKey, modelKeyEnvVar } from './config.js';
import type { Credentials, ModelConfig } from './types.js';

export interface PromptOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Whether anyone is there to answer; defaults to stdin being a TTY */
  interactive?: boolean;
  terminal?: boolean;
  onInterrupt?: () => void;
}

export function exitOnInterrupt(): void {
  console.log('\n⚠️ Process interrupted by user.');
  process.exit(1);
}

/**
 * Ask for the idea and any missing key on the terminal
 */
export async function promptMissing(
  idea: string,
  credentials: Credentials,
  model: ModelConfig,
  options: PromptOptions = {}
): Promise<{ idea: string; credentials: Credentials }> {
  const needsIdea = idea === '';
  const needsModelKey = !isUsableKey(credentials.modelApiKey, PLACEHOLDER_KEYS[model.provider]);
  const needsImageKey = !isUsableKey(credentials.imageAccessKey, PLACEHOLDER_KEYS.unsplash);
  const interactive = options.interactive ?? Boolean(process.stdin.isTTY);

  if (!interactive || !(needsIdea || needsModelKey || needsImageKey)) {
    return { idea, credentials };
  }

  const rl = createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
    terminal: options.terminal,
  });
  // While a question is pending readline takes Ctrl-C instead of the process
  rl.on('SIGINT', options.onInterrupt ?? exitOnInterrupt);
  try {
    const resolved: Credentials = { ...credentials };
    if (needsModelKey) {
      resolved.modelApiKey = (await rl.question(`Enter your ${model.label} API key (${modelKeyEnvVar(model.provider)}): `)).trim();
    }
    if (needsImageKey) {
      console.log('\nFor Unsplash images, you need to provide your Access Key (not Secret Key)');
      console.log('You can find your Access Key at: https://unsplash.com/oauth/applications');
      resolved.imageAccessKey = (await rl.question('Enter your Unsplash Access Key (leave blank to skip images): ')).trim();
    }
    const resolvedIdea = needsIdea ? (await rl.question('\nEnter your startup idea: ')).trim() : idea;
    return { idea: resolvedIdea, credentials: resolved };
  } finally {
    rl.close();
  }
}
