import axios, { type AxiosInstance } from 'axios';
import mime from 'mime';
import { z } from 'zod';
import { isUsableKey, PLACEHOLDER_KEYS } from './config.js';
import { errorMessage } from './errors.js';
import type { Credentials, SectionImage } from './types.js';

export const UNSPLASH_SEARCH_URL = 'https://api.unsplash.com/search/photos';

const SearchResponseSchema = z.object({
  results: z.array(
    z.object({
      urls: z.object({
        regular: z.string().url(),
      }),
    })
  ),
});

/**
 * Best-effort stock photo lookup against the Unsplash search API.
 * Never throws: every failure resolves to null.
 */
export class ImageLookup {
  private readonly http: AxiosInstance;

  constructor(http: AxiosInstance = axios.create()) {
    this.http = http;
  }

  async findImage(query: string, credentials: Credentials): Promise<SectionImage | null> {
    const accessKey = credentials.imageAccessKey;
    if (!isUsableKey(accessKey, PLACEHOLDER_KEYS.unsplash)) {
      console.log(`    [⚠️] Unsplash API key not set. Skipping image for '${query}'`);
      return null;
    }

    try {
      console.log(`    [🔍] Searching for image related to '${query}'...`);
      const response = await this.http.get<unknown>(UNSPLASH_SEARCH_URL, {
        params: { query, per_page: 1 },
        // The Access Key (not the Secret Key) is sent as the Client-ID
        headers: { Authorization: `Client-ID ${accessKey}` },
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        console.warn(`    [⚠️] Unsplash API error: ${response.status}`);
        return null;
      }

      const parsed = SearchResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        console.warn(`    [⚠️] Invalid response from Unsplash: ${parsed.error.issues[0]?.message}`);
        return null;
      }

      const first = parsed.data.results[0];
      if (!first) {
        console.log(`    [❌] No image found for '${query}'`);
        return null;
      }

      const imageUrl = first.urls.regular;
      console.log(`    [✓] Found image for '${query}', downloading...`);
      const imageResponse = await this.http.get<ArrayBuffer>(imageUrl, {
        responseType: 'arraybuffer',
        validateStatus: () => true,
      });

      if (imageResponse.status !== 200) {
        console.warn(`    [⚠️] Image download failed: ${imageResponse.status}`);
        return null;
      }

      return {
        data: Buffer.from(imageResponse.data),
        mimeType: resolveMimeType(imageResponse.headers['content-type'], imageUrl),
      };
    } catch (error) {
      console.warn(`    [❌] Error fetching image for '${query}': ${errorMessage(error)}`);
      return null;
    }
  }
}

/**
 * Prefer the server's content type, then the URL's extension, then JPEG
 */
export function resolveMimeType(contentType: unknown, url: string): string {
  if (typeof contentType === 'string' && contentType.startsWith('image/')) {
    return contentType.split(';')[0].trim();
  }
  const pathname = new URL(url).pathname;
  return mime.getType(pathname) ?? 'image/jpeg';
}
