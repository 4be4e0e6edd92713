import { readFile, writeFile } from 'fs/promises';
import mime from 'mime';
import {
  PDFDocument,
  StandardFonts,
  rgb,
  type PDFFont,
  type PDFImage,
  type PDFPage,
  type RGB,
} from 'pdf-lib';
import { errorMessage } from './errors.js';
import { INCH, type Block, type ParagraphStyle, type TextRun } from './section-layout.js';

// US Letter
const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN = INCH;
const CONTENT_WIDTH = PAGE_WIDTH - MARGIN * 2;
const LINE_HEIGHT_RATIO = 1.2;

const DARK_BLUE = hexColor('#1F497D');
const MEDIUM_BLUE = hexColor('#4472C4');
const DARK_GRAY = hexColor('#323232');

type FontName = 'regular' | 'bold' | 'oblique';

interface TextStyle {
  font: FontName;
  size: number;
  color: RGB;
  spaceAfter: number;
  align: 'left' | 'center';
  indent: number;
  bullet?: string;
}

const STYLES: Record<'title' | 'subtitle' | 'heading' | ParagraphStyle, TextStyle> = {
  title: { font: 'bold', size: 24, color: DARK_BLUE, spaceAfter: 20, align: 'center', indent: 0 },
  subtitle: { font: 'oblique', size: 18, color: MEDIUM_BLUE, spaceAfter: 15, align: 'center', indent: 0 },
  heading: { font: 'bold', size: 20, color: DARK_BLUE, spaceAfter: 15, align: 'left', indent: 0 },
  normal: { font: 'regular', size: 12, color: DARK_GRAY, spaceAfter: 10, align: 'left', indent: 0 },
  highlight: { font: 'bold', size: 12, color: MEDIUM_BLUE, spaceAfter: 10, align: 'left', indent: 0 },
  key: { font: 'bold', size: 14, color: MEDIUM_BLUE, spaceAfter: 5, align: 'left', indent: 0 },
  bullet: { font: 'regular', size: 12, color: DARK_GRAY, spaceAfter: 5, align: 'left', indent: 20, bullet: '•' },
};

export interface WriteSummary {
  pageCount: number;
  imagesEmbedded: number;
  imagesSkipped: number;
  /** Page (from 1) each heading starts on */
  headings: Array<{ text: string; page: number }>;
}

interface Word {
  text: string;
  font: PDFFont;
  color: RGB;
}

function hexColor(hex: string): RGB {
  const value = parseInt(hex.slice(1), 16);
  return rgb(((value >> 16) & 0xff) / 255, ((value >> 8) & 0xff) / 255, (value & 0xff) / 255);
}

/**
 * Split a word wider than maxWidth into pieces that each fit, breaking between characters
 */
export function breakWord(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  if (font.widthOfTextAtSize(text, size) <= maxWidth) return [text];

  const pieces: string[] = [];
  let piece = '';
  for (const ch of Array.from(text)) {
    if (piece !== '' && font.widthOfTextAtSize(piece + ch, size) > maxWidth) {
      pieces.push(piece);
      piece = ch;
    } else {
      piece += ch;
    }
  }
  pieces.push(piece);
  return pieces;
}

/**
 * Height a heading at blocks[index] needs to stay on the same page as the first line or image
 * that follows it
 */
function headingReserve(blocks: Block[], index: number): number {
  const own = STYLES.heading.size * LINE_HEIGHT_RATIO + STYLES.heading.spaceAfter;
  let gap = 0;
  for (const block of blocks.slice(index + 1)) {
    if (block.type === 'spacer') {
      gap += block.height;
    } else if (block.type === 'paragraph') {
      return own + gap + STYLES[block.style].size * LINE_HEIGHT_RATIO;
    } else if (block.type === 'image') {
      return own + gap + block.height * Math.min(1, CONTENT_WIDTH / block.width);
    } else {
      break;
    }
  }
  return own;
}

/**
 * Lays blocks out on Letter pages, wrapping text and breaking pages as needed
 */
class PageCursor {
  private page: PDFPage;
  private y = PAGE_HEIGHT - MARGIN;

  constructor(
    private readonly doc: PDFDocument,
    private readonly fonts: Record<FontName, PDFFont>,
    private readonly charsets: Map<PDFFont, Set<number>>
  ) {
    this.page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  }

  get pageNumber(): number {
    return this.doc.getPageCount();
  }

  advance(height: number): void {
    this.y -= height;
  }

  ensureSpace(height: number): void {
    if (this.y - height < MARGIN) {
      this.page = this.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      this.y = PAGE_HEIGHT - MARGIN;
    }
  }

  /**
   * Replace characters the standard fonts cannot encode
   */
  private encodable(text: string, font: PDFFont): string {
    const charset = this.charsets.get(font);
    if (!charset) return text;
    return Array.from(text, ch => {
      const code = ch.codePointAt(0);
      return code !== undefined && charset.has(code) ? ch : '?';
    }).join('');
  }

  drawText(runs: TextRun[], style: TextStyle): void {
    const baseFont = this.fonts[style.font];
    const maxWidth = CONTENT_WIDTH - style.indent;
    const words: Word[] = runs.flatMap(run => {
      const font = run.bold ? this.fonts.bold : baseFont;
      return run.text
        .split(/\s+/)
        .filter(part => part.length > 0)
        .flatMap(part => breakWord(this.encodable(part, font), font, style.size, maxWidth))
        .map(text => ({ text, font, color: style.color }));
    });
    if (words.length === 0) return;

    const lineHeight = style.size * LINE_HEIGHT_RATIO;
    const left = MARGIN + style.indent;
    const spaceWidth = baseFont.widthOfTextAtSize(' ', style.size);

    const lines: Word[][] = [];
    let line: Word[] = [];
    let lineWidth = 0;
    for (const word of words) {
      const width = word.font.widthOfTextAtSize(word.text, style.size);
      const extra = line.length === 0 ? width : spaceWidth + width;
      if (line.length > 0 && lineWidth + extra > maxWidth) {
        lines.push(line);
        line = [word];
        lineWidth = width;
      } else {
        line.push(word);
        lineWidth += extra;
      }
    }
    lines.push(line);

    lines.forEach((lineWords, index) => {
      this.ensureSpace(lineHeight);
      this.y -= style.size;

      const widths = lineWords.map(word => word.font.widthOfTextAtSize(word.text, style.size));
      const total = widths.reduce((sum, w) => sum + w, 0) + spaceWidth * (lineWords.length - 1);
      let x = style.align === 'center' ? (PAGE_WIDTH - total) / 2 : left;

      if (style.bullet && index === 0) {
        this.page.drawText(style.bullet, {
          x: left - style.indent / 2,
          y: this.y,
          size: style.size,
          font: baseFont,
          color: style.color,
        });
      }

      lineWords.forEach((word, i) => {
        this.page.drawText(word.text, { x, y: this.y, size: style.size, font: word.font, color: word.color });
        x += widths[i] + spaceWidth;
      });

      this.y -= lineHeight - style.size;
    });

    this.y -= style.spaceAfter;
  }

  drawImage(image: PDFImage, width: number, height: number): void {
    const scale = Math.min(1, CONTENT_WIDTH / width);
    const drawWidth = width * scale;
    const drawHeight = height * scale;
    this.ensureSpace(drawHeight);
    this.y -= drawHeight;
    this.page.drawImage(image, {
      x: (PAGE_WIDTH - drawWidth) / 2,
      y: this.y,
      width: drawWidth,
      height: drawHeight,
    });
  }
}

async function embedImageFile(doc: PDFDocument, imagePath: string): Promise<PDFImage> {
  const bytes = await readFile(imagePath);
  const type = mime.getType(imagePath);
  if (type === 'image/png') return doc.embedPng(bytes);
  if (type === 'image/jpeg') return doc.embedJpg(bytes);
  throw new Error(`Unsupported image type: ${type ?? 'unknown'}`);
}

/**
 * Render blocks to a PDF file
 */
export async function writePdf(blocks: Block[], outputPath: string, title: string): Promise<WriteSummary> {
  const doc = await PDFDocument.create();
  doc.setTitle(title);
  doc.setSubject('Startup pitch deck');
  doc.setCreator('pitch-deck-generator');

  const fonts: Record<FontName, PDFFont> = {
    regular: await doc.embedFont(StandardFonts.Helvetica),
    bold: await doc.embedFont(StandardFonts.HelveticaBold),
    oblique: await doc.embedFont(StandardFonts.HelveticaOblique),
  };
  const charsets = new Map<PDFFont, Set<number>>(
    Object.values(fonts).map((font): [PDFFont, Set<number>] => [font, new Set(font.getCharacterSet())])
  );

  const cursor = new PageCursor(doc, fonts, charsets);
  let imagesEmbedded = 0;
  let imagesSkipped = 0;
  const headings: WriteSummary['headings'] = [];

  for (const [index, block] of blocks.entries()) {
    switch (block.type) {
      case 'heading':
        cursor.ensureSpace(headingReserve(blocks, index));
        headings.push({ text: block.text, page: cursor.pageNumber });
        cursor.drawText([{ text: block.text }], STYLES.heading);
        break;
      case 'title':
      case 'subtitle':
        cursor.drawText([{ text: block.text }], STYLES[block.type]);
        break;
      case 'paragraph':
        cursor.drawText(block.runs, STYLES[block.style]);
        break;
      case 'spacer':
        cursor.advance(block.height);
        break;
      case 'image':
        try {
          const image = await embedImageFile(doc, block.path);
          cursor.drawImage(image, block.width, block.height);
          imagesEmbedded++;
        } catch (error) {
          console.warn(`    [⚠️] Error processing image ${block.path}: ${errorMessage(error)}`);
          imagesSkipped++;
        }
        break;
    }
  }

  const bytes = await doc.save();
  await writeFile(outputPath, bytes);

  return { pageCount: doc.getPageCount(), imagesEmbedded, imagesSkipped, headings };
}
