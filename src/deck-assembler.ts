import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import mime from 'mime';
import { errorMessage } from './errors.js';
import { ImageLookup } from './image-lookup.js';
import { writePdf, type WriteSummary } from './pdf-writer.js';
import {
  IMAGE_HEIGHT,
  IMAGE_WIDTH,
  INCH,
  classifySection,
  renderSectionContent,
  spacer,
  type Block,
} from './section-layout.js';
import { SECTION_ORDER, type Credentials, type PitchDeck, type SectionName } from './types.js';

const UNSAFE_FILENAME_CHARS = ['/', '\\', ':', '*', '?', '"', '<', '>', '|'];
const MAX_BASE_NAME_LENGTH = 50;

export interface AssembledDeck {
  documentPath: string;
  jsonPath: string;
  summary: WriteSummary;
}

export interface DeckAssemblerOptions {
  outputDirectory: string;
  /** Shown on the title page, e.g. "LLaMA 4 Maverick (Novita AI)" */
  modelLabel: string;
  imageLookup?: ImageLookup;
  /** Parent of the per-run image directory (default: the OS temp directory) */
  tempRoot?: string;
}

/**
 * Turn a title into a base file name: lowercase, path-unsafe characters
 * replaced with "-", at most 50 characters, spaces replaced with "_"
 */
export function sanitizeTitle(title: string): string {
  let safe = title.toLowerCase();
  for (const ch of UNSAFE_FILENAME_CHARS) {
    safe = safe.split(ch).join('-');
  }
  return Array.from(safe).slice(0, MAX_BASE_NAME_LENGTH).join('').replace(/ /g, '_');
}

function tempImageName(section: SectionName, mimeType: string): string {
  const slug = section.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '');
  return `temp_${slug}.${mime.getExtension(mimeType) ?? 'jpg'}`;
}

/**
 * Build the block sequence for a deck: title page, then every section in fixed order
 */
export function layoutDeck(
  deck: PitchDeck,
  title: string,
  modelLabel: string,
  imagePaths: Partial<Record<SectionName, string>> = {}
): Block[] {
  const blocks: Block[] = [
    { type: 'title', text: title },
    spacer(0.25 * INCH),
    { type: 'subtitle', text: `Pitch Deck Generated with ${modelLabel}` },
    spacer(1 * INCH),
  ];

  SECTION_ORDER.forEach((section, index) => {
    if (index > 0) {
      blocks.push(spacer(0.5 * INCH));
    }
    blocks.push({ type: 'heading', text: section });
    blocks.push(spacer(0.25 * INCH));

    const imagePath = imagePaths[section];
    if (imagePath) {
      blocks.push({ type: 'image', path: imagePath, width: IMAGE_WIDTH, height: IMAGE_HEIGHT });
      blocks.push(spacer(0.25 * INCH));
    }

    blocks.push(...renderSectionContent(classifySection(deck[section])));
  });

  return blocks;
}

export class DeckAssembler {
  private readonly outputDirectory: string;
  private readonly modelLabel: string;
  private readonly imageLookup: ImageLookup;
  private readonly tempRoot: string;

  constructor(options: DeckAssemblerOptions) {
    this.outputDirectory = options.outputDirectory;
    this.modelLabel = options.modelLabel;
    this.imageLookup = options.imageLookup ?? new ImageLookup();
    this.tempRoot = options.tempRoot ?? os.tmpdir();
  }

  /**
   * Write {base}_pitch_deck.pdf and {base}_pitch_deck.json for a deck
   */
  async assemble(deck: PitchDeck, title: string, credentials: Credentials = {}): Promise<AssembledDeck> {
    const baseName = sanitizeTitle(title);
    await mkdir(this.outputDirectory, { recursive: true });

    const documentPath = path.resolve(this.outputDirectory, `${baseName}_pitch_deck.pdf`);
    const jsonPath = path.resolve(this.outputDirectory, `${baseName}_pitch_deck.json`);

    // Unique per run, so concurrent runs never share image files
    const tempDirectory = await mkdtemp(path.join(this.tempRoot, 'pitch-deck-'));
    let summary: WriteSummary;
    try {
      const imagePaths = await this.stageImages(credentials, tempDirectory);
      const blocks = layoutDeck(deck, title, this.modelLabel, imagePaths);

      console.log(`\n[📄] Rendering ${blocks.length} blocks...`);
      summary = await writePdf(blocks, documentPath, title);
      console.log(`[✓] Saved PDF as ${documentPath} (${summary.pageCount} pages, ${summary.imagesEmbedded} images)`);
    } finally {
      await rm(tempDirectory, { recursive: true, force: true });
    }

    await writeFile(jsonPath, JSON.stringify(deck, null, 2), 'utf-8');
    console.log(`[✓] Saved structured content as ${jsonPath}`);

    return { documentPath, jsonPath, summary };
  }

  /**
   * Fetch one image per section, in section order, into the temporary directory
   */
  private async stageImages(
    credentials: Credentials,
    tempDirectory: string
  ): Promise<Partial<Record<SectionName, string>>> {
    const imagePaths: Partial<Record<SectionName, string>> = {};

    for (const section of SECTION_ORDER) {
      const image = await this.imageLookup.findImage(section, credentials);
      if (!image) continue;

      const imagePath = path.join(tempDirectory, tempImageName(section, image.mimeType));
      try {
        await writeFile(imagePath, image.data);
        imagePaths[section] = imagePath;
      } catch (error) {
        console.warn(`    [⚠️] Could not stage image for ${section}: ${errorMessage(error)}`);
      }
    }

    return imagePaths;
  }
}
