import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm, writeFile } from 'fs/promises';
import path from 'path';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import { breakWord, writePdf } from '../src/pdf-writer.js';
import { paragraph, type Block } from '../src/section-layout.js';
import { makeTempDir, tinyPng } from './helpers.js';

describe('writePdf', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a single page for a short document', async () => {
    const output = path.join(dir, 'short.pdf');
    const blocks: Block[] = [
      { type: 'title', text: 'Coffee Club' },
      { type: 'heading', text: 'Problem' },
      paragraph('highlight', { text: 'Beans go stale.' }),
    ];

    const summary = await writePdf(blocks, output, 'Coffee Club');

    expect(summary).toEqual({
      pageCount: 1,
      imagesEmbedded: 0,
      imagesSkipped: 0,
      headings: [{ text: 'Problem', page: 1 }],
    });
    const pdf = await PDFDocument.load(await readFile(output));
    expect(pdf.getPageCount()).toBe(1);
  });

  it('breaks pages when content overflows', async () => {
    const sentence = 'Specialty coffee drinkers want fresh beans delivered on a predictable schedule.';
    const blocks: Block[] = Array.from({ length: 120 }, () => paragraph('normal', { text: sentence }));

    const summary = await writePdf(blocks, path.join(dir, 'long.pdf'), 'Long');

    expect(summary.pageCount).toBeGreaterThan(1);
  });

  it('wraps a paragraph longer than one line without failing', async () => {
    const text = 'word '.repeat(400);
    const summary = await writePdf([paragraph('bullet', { text })], path.join(dir, 'wrap.pdf'), 'Wrap');
    expect(summary.pageCount).toBeGreaterThanOrEqual(1);
  });

  it('replaces characters the standard fonts cannot encode', async () => {
    const blocks: Block[] = [
      { type: 'heading', text: 'Market → 2030' },
      paragraph('normal', { text: 'Growth:', bold: true }, { text: ' 日本 and ☕ markets' }),
    ];

    await expect(writePdf(blocks, path.join(dir, 'chars.pdf'), 'Chars')).resolves.toMatchObject({ pageCount: 1 });
  });

  it('embeds PNG images and skips unreadable ones', async () => {
    const good = path.join(dir, 'good.png');
    const bad = path.join(dir, 'bad.jpeg');
    await writeFile(good, tinyPng());
    await writeFile(bad, Buffer.from('not a jpeg'));

    const summary = await writePdf(
      [
        { type: 'image', path: good, width: 288, height: 216 },
        { type: 'image', path: bad, width: 288, height: 216 },
        { type: 'image', path: path.join(dir, 'missing.png'), width: 288, height: 216 },
      ],
      path.join(dir, 'images.pdf'),
      'Images'
    );

    expect(summary).toEqual({ pageCount: 1, imagesEmbedded: 1, imagesSkipped: 2, headings: [] });
  });

  it('moves a heading to the next page when its paragraph would not fit under it', async () => {
    // 600pt down leaves 48pt above the bottom margin: room for the heading line but not for
    // the heading, its spacing and the first line of text
    const blocks: Block[] = [
      { type: 'spacer', height: 600 },
      { type: 'heading', text: 'Problem' },
      { type: 'spacer', height: 18 },
      paragraph('highlight', { text: 'Beans go stale.' }),
    ];

    const summary = await writePdf(blocks, path.join(dir, 'orphan.pdf'), 'Orphan');

    expect(summary.headings).toEqual([{ text: 'Problem', page: 2 }]);
    expect(summary.pageCount).toBe(2);
  });

  it('moves a heading to the next page along with an image that would not fit', async () => {
    const image = path.join(dir, 'photo.png');
    await writeFile(image, tinyPng());
    const blocks: Block[] = [
      { type: 'spacer', height: 400 },
      { type: 'heading', text: 'Solution' },
      { type: 'spacer', height: 18 },
      { type: 'image', path: image, width: 288, height: 216 },
    ];

    const summary = await writePdf(blocks, path.join(dir, 'orphan-image.pdf'), 'Orphan');

    expect(summary.headings).toEqual([{ text: 'Solution', page: 2 }]);
    expect(summary.pageCount).toBe(2);
  });

  it('leaves a heading in place when its paragraph fits under it', async () => {
    const blocks: Block[] = [
      { type: 'spacer', height: 500 },
      { type: 'heading', text: 'Problem' },
      { type: 'spacer', height: 18 },
      paragraph('highlight', { text: 'Beans go stale.' }),
    ];

    const summary = await writePdf(blocks, path.join(dir, 'kept.pdf'), 'Kept');

    expect(summary.headings).toEqual([{ text: 'Problem', page: 1 }]);
    expect(summary.pageCount).toBe(1);
  });
});

describe('breakWord', () => {
  it('splits a word wider than the line into pieces that each fit', async () => {
    const doc = await PDFDocument.create();
    const font = await doc.embedFont(StandardFonts.HelveticaBold);
    const url = `https://coffee.example/subscribe?plan=${'roast-'.repeat(19)}end`;

    const pieces = breakWord(url, font, 12, 468);

    expect(font.widthOfTextAtSize(url, 12)).toBeGreaterThan(468);
    expect(pieces.length).toBeGreaterThan(1);
    expect(pieces.join('')).toBe(url);
    for (const piece of pieces) {
      expect(font.widthOfTextAtSize(piece, 12)).toBeLessThanOrEqual(468);
    }
  });

  it('returns a word that fits as it is', async () => {
    const doc = await PDFDocument.create();
    const font = await doc.embedFont(StandardFonts.Helvetica);
    expect(breakWord('coffee', font, 12, 468)).toEqual(['coffee']);
  });
});
