/**
 * Pitch deck sections, in the order they appear in the document
 */
export const SECTION_ORDER = [
  'Problem',
  'Solution',
  'Market Analysis',
  'Competitors',
  'Unique Selling Proposition (USP)',
  'Business Model',
  'Financial Projections',
  'Team Overview',
  'Call to Action',
] as const;

export type SectionName = (typeof SECTION_ORDER)[number];

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Generated deck content, exactly as the model returned it.
 * Keys are normally the nine SECTION_ORDER names, but a model that drops
 * or renames a key produces a deck without it.
 */
export type PitchDeck = Readonly<JsonObject>;

/**
 * One-level nested value inside a `fields` section
 */
export type FieldValue =
  | { kind: 'text'; text: string }
  | { kind: 'items'; items: string[] }
  | { kind: 'fields'; fields: Array<[label: string, value: string]> };

/**
 * Section content, classified from the raw JSON value at render time
 */
export type SectionContent =
  | { kind: 'text'; text: string }
  | { kind: 'items'; items: string[] }
  | { kind: 'fields'; fields: Array<[label: string, value: FieldValue]> };

/**
 * Illustration fetched for a section
 */
export interface SectionImage {
  data: Buffer;
  mimeType: string;
}

/**
 * API keys for the model service and the image service
 */
export interface Credentials {
  modelApiKey?: string;
  imageAccessKey?: string;
}

export type ModelProvider = 'novita' | 'openrouter';

/**
 * Where and how the content generator talks to the language model
 */
export interface ModelConfig {
  provider: ModelProvider;
  baseURL: string;
  model: string;
  /** Human-readable label used in messages and the title page */
  label: string;
}

/**
 * Result returned to a front end
 */
export interface PitchDeckResult {
  documentPath: string;
  jsonPath: string;
  status: string;
}
