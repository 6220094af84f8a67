import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { EbookRendererService, buildEbookDocument } from './ebook-renderer.service';
import { createChapterState, createEbookState, type EbookState } from '../../types/ebook.types';

function sampleState(): EbookState {
  const state = createEbookState({
    title: 'Compost at Home',
    topic: 'home composting',
    targetAudience: 'apartment dwellers',
    authorName: 'Sam Rivera',
  });
  state.outline = {
    ebookTitle: 'Compost Without a Garden',
    ebookSubtitle: '',
    chapters: [
      {
        chapterNumber: 1,
        chapterTitle: 'Why Compost',
        chapterPurpose: 'Motivation',
        sections: [{ sectionTitle: 'Waste adds up', sectionBrief: '' }],
        keyTakeaway: 'Start small',
      },
      {
        chapterNumber: 2,
        chapterTitle: 'Bins',
        chapterPurpose: 'Equipment',
        sections: [{ sectionTitle: 'Choosing a bin', sectionBrief: '' }],
        keyTakeaway: 'Any lid works',
      },
    ],
  };
  const [first, second] = state.outline.chapters.map(createChapterState);
  first.rawSections = [{ sectionTitle: 'Waste adds up', sectionText: 'Draft text.' }];
  first.editedSections = [{ sectionTitle: 'Waste adds up', sectionText: 'A **third** of kitchen waste\ncan be composted.\n\nStart today.' }];
  state.chapters = [first, second];
  state.introductionText = 'Welcome to composting.';
  state.conclusionText = null;
  return state;
}

describe('buildEbookDocument', () => {
  it('prefers edited sections and skips chapters without content', () => {
    const book = buildEbookDocument(sampleState(), new Date(2026, 2, 5));

    expect(book.title).toBe('Compost Without a Garden');
    expect(book.subtitle).toBe('');
    expect(book.chapters).toEqual([
      {
        number: 1,
        title: 'Why Compost',
        imagePath: null,
        sections: [
          { title: 'Waste adds up', paragraphs: ['A third of kitchen waste can be composted.', 'Start today.'] },
        ],
      },
    ]);
    expect(book.introduction).toEqual(['Welcome to composting.']);
    expect(book.conclusion).toEqual([]);
    expect(book.copyrightLines[0]).toBe('© 2026 Sam Rivera. All rights reserved.');
    expect(book.copyrightLines[2]).toBe('Generated March 5, 2026.');
  });

  it('falls back to the configured title before an outline exists', () => {
    const state = sampleState();
    state.outline = null;
    state.config.subtitle = 'A starter guide';

    const book = buildEbookDocument(state);

    expect(book.title).toBe('Compost at Home');
    expect(book.subtitle).toBe('A starter guide');
  });
});

describe('EbookRendererService', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ebook-test-'));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('writes a PDF named after the title', async () => {
    const pdfPath = await new EbookRendererService(outputDir).renderPdf(sampleState());

    expect(path.dirname(pdfPath)).toBe(outputDir);
    expect(path.basename(pdfPath)).toMatch(/^compost_at_home_\d{8}_\d{6}\.pdf$/);
    const bytes = await fs.readFile(pdfPath);
    expect(bytes.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('writes a DOCX and skips a missing chapter image', async () => {
    const state = sampleState();
    state.chapters[0].sectionImagePaths = [path.join(outputDir, 'missing.jpg')];

    const docxPath = await new EbookRendererService(outputDir).renderDocx(state);

    expect(path.basename(docxPath)).toMatch(/^compost_at_home_\d{8}_\d{6}\.docx$/);
    const bytes = await fs.readFile(docxPath);
    expect(bytes.subarray(0, 2).toString('latin1')).toBe('PK');
  });
});
