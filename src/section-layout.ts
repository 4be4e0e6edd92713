import type { FieldValue, JsonValue, SectionContent } from './types.js';

export type ParagraphStyle = 'normal' | 'highlight' | 'key' | 'bullet';

export interface TextRun {
  text: string;
  bold?: boolean;
}

/**
 * Document building blocks, laid out top to bottom by the PDF writer
 */
export type Block =
  | { type: 'title'; text: string }
  | { type: 'subtitle'; text: string }
  | { type: 'heading'; text: string }
  | { type: 'spacer'; height: number }
  | { type: 'paragraph'; style: ParagraphStyle; runs: TextRun[] }
  | { type: 'image'; path: string; width: number; height: number };

// Points (1 inch = 72pt)
export const INCH = 72;
export const IMAGE_WIDTH = 4 * INCH;
export const IMAGE_HEIGHT = 3 * INCH;

const DESCRIPTION_KEY = 'Description';

export function spacer(height: number): Block {
  return { type: 'spacer', height };
}

export function paragraph(style: ParagraphStyle, ...runs: TextRun[]): Block {
  return { type: 'paragraph', style, runs };
}

function stringify(value: JsonValue): string {
  if (value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function toFieldValue(value: JsonValue): FieldValue {
  if (Array.isArray(value)) {
    return { kind: 'items', items: value.map(stringify) };
  }
  if (value !== null && typeof value === 'object') {
    return {
      kind: 'fields',
      fields: Object.entries(value).map(([label, inner]): [string, string] => [label, stringify(inner)]),
    };
  }
  return { kind: 'text', text: stringify(value) };
}

/**
 * Classify a raw section value. A missing value is empty text.
 */
export function classifySection(value: JsonValue | undefined): SectionContent {
  if (value === undefined || value === null) {
    return { kind: 'text', text: '' };
  }
  if (Array.isArray(value)) {
    return { kind: 'items', items: value.map(stringify) };
  }
  if (typeof value === 'object') {
    return {
      kind: 'fields',
      fields: Object.entries(value).map(([label, inner]): [string, FieldValue] => [label, toFieldValue(inner)]),
    };
  }
  return { kind: 'text', text: String(value) };
}

/**
 * Split prose into sentences, keeping the terminal punctuation
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map(sentence => sentence.trim())
    .filter(sentence => sentence.length > 0);
}

function renderText(text: string): Block[] {
  return splitSentences(text).map((sentence, i) =>
    paragraph(i === 0 ? 'highlight' : 'normal', { text: sentence })
  );
}

function renderBullets(items: string[]): Block[] {
  return items.map(item => paragraph('bullet', { text: item }));
}

function flattenFieldValue(value: FieldValue): string {
  switch (value.kind) {
    case 'text':
      return value.text;
    case 'items':
      return value.items.join('; ');
    case 'fields':
      return value.fields.map(([label, text]) => `${label}: ${text}`).join('; ');
  }
}

function renderField(label: string, value: FieldValue): Block[] {
  switch (value.kind) {
    case 'items':
      return [paragraph('key', { text: `${label}:` }), ...renderBullets(value.items)];
    case 'fields':
      return [
        paragraph('key', { text: `${label}:` }),
        ...value.fields.map(([subLabel, text]) =>
          paragraph('bullet', { text: `${subLabel}:`, bold: true }, { text: ` ${text}` })
        ),
      ];
    case 'text':
      return [paragraph('normal', { text: `${label}:`, bold: true }, { text: ` ${value.text}` })];
  }
}

function renderFields(fields: Array<[string, FieldValue]>): Block[] {
  const blocks: Block[] = [];

  const description = fields.find(([label]) => label === DESCRIPTION_KEY);
  if (description) {
    blocks.push(paragraph('highlight', { text: flattenFieldValue(description[1]) }));
    blocks.push(spacer(0.1 * INCH));
  }

  for (const [label, value] of fields) {
    if (label === DESCRIPTION_KEY) continue;
    blocks.push(...renderField(label, value));
  }
  return blocks;
}

/**
 * Render a section's content into paragraph blocks
 */
export function renderSectionContent(content: SectionContent): Block[] {
  switch (content.kind) {
    case 'text':
      return renderText(content.text);
    case 'items':
      return [paragraph('key', { text: 'Key Points:' }), ...renderBullets(content.items)];
    case 'fields':
      return renderFields(content.fields);
  }
}
