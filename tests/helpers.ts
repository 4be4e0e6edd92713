import { mkdtemp } from 'fs/promises';
import os from 'os';
import path from 'path';
import { deflateSync } from 'zlib';
import type { ClientOptions } from 'openai';
import { ImageLookup } from '../src/image-lookup.js';
import { SECTION_ORDER, type Credentials, type JsonObject, type SectionImage } from '../src/types.js';

export const TEST_MODEL = {
  provider: 'novita',
  baseURL: 'http://llm.test/v1',
  model: 'test-model',
  label: 'Test Model',
} as const;

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'pitch-deck-test-'));
}

/**
 * Nine sections, each a single sentence
 */
export function sentenceDeck(): JsonObject {
  const deck: JsonObject = {};
  for (const section of SECTION_ORDER) {
    deck[section] = `${section} content for the coffee box.`;
  }
  return deck;
}

// ── OpenAI-compatible endpoint ──

export interface RecordedRequest {
  url: string;
  body: unknown;
}

type Fetch = NonNullable<ClientOptions['fetch']>;

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function chatCompletion(content: string | null): unknown {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1700000000,
    model: 'test-model',
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content },
        finish_reason: 'stop',
        logprobs: null,
      },
    ],
  };
}

/**
 * In-process stand-in for the model service
 */
export function fakeModelService(reply: { status?: number; body: unknown } | Error): {
  fetch: Fetch;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const fetch: Fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    requests.push({ url, body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined });
    if (reply instanceof Error) throw reply;
    return jsonResponse(reply.status ?? 200, reply.body);
  };
  return { fetch, requests };
}

export function modelReply(content: string | null): { fetch: Fetch; requests: RecordedRequest[] } {
  return fakeModelService({ body: chatCompletion(content) });
}

// ── Images ──

const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  return c >>> 0;
});

function crc32(data: Buffer): number {
  let crc = 0xffffffff;
  for (const byte of data) {
    crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function pngChunk(type: string, data: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32BE(data.length);
  const typeAndData = Buffer.concat([Buffer.from(type, 'ascii'), data]);
  const crc = Buffer.alloc(4);
  crc.writeUInt32BE(crc32(typeAndData));
  return Buffer.concat([length, typeAndData, crc]);
}

/**
 * A valid 1x1 red RGB PNG
 */
export function tinyPng(): Buffer {
  const header = Buffer.alloc(13);
  header.writeUInt32BE(1, 0); // width
  header.writeUInt32BE(1, 4); // height
  header[8] = 8; // bit depth
  header[9] = 2; // RGB
  const pixels = deflateSync(Buffer.from([0, 255, 0, 0]));
  return Buffer.concat([
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
    pngChunk('IHDR', header),
    pngChunk('IDAT', pixels),
    pngChunk('IEND', Buffer.alloc(0)),
  ]);
}

/**
 * Image lookup that answers from a fixed table and records its queries
 */
export class StubImageLookup extends ImageLookup {
  readonly queries: string[] = [];

  constructor(private readonly images: Partial<Record<string, SectionImage>> = {}) {
    super();
  }

  override async findImage(query: string, _credentials: Credentials): Promise<SectionImage | null> {
    this.queries.push(query);
    return this.images[query] ?? null;
  }
}
