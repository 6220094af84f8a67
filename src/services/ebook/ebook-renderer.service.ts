import { AlignmentType, Document, HeadingLevel, ImageRun, Packer, PageBreak, Paragraph, TableOfContents, TextRun } from 'docx';
import { createWriteStream } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import PDFDocument from 'pdfkit';
import { logger } from '../../config/logger';
import { OUTPUT_DIRS } from '../../config/settings';
import type { EbookState } from '../../types/ebook.types';
import { fileTimestamp, slugify } from '../../utils/file-naming';
import { toParagraphs } from '../../utils/strip-markdown';

// ===========================================================================
// Ebook rendering
//
// EbookState -> EbookDocument (plain paragraphs, resolved titles) -> PDF or
// DOCX. Both renderers lay out the same pages: cover, copyright, contents,
// introduction, chapters, conclusion.
// ===========================================================================

export interface EbookSection {
  title: string;
  paragraphs: string[];
}

export interface EbookChapter {
  number: number;
  title: string;
  imagePath: string | null;
  sections: EbookSection[];
}

export interface EbookDocument {
  title: string;
  subtitle: string;
  authorName: string;
  coverImagePath: string | null;
  copyrightLines: string[];
  introduction: string[];
  chapters: EbookChapter[];
  conclusion: string[];
}

export interface EbookRenderer {
  renderPdf(state: EbookState): Promise<string>;
  renderDocx(state: EbookState): Promise<string>;
}

const dateFormat = new Intl.DateTimeFormat('en-US', { month: 'long', day: 'numeric', year: 'numeric' });

/**
 * Resolve what goes on the page. Edited sections win over the first draft;
 * chapters with neither are left out.
 */
export function buildEbookDocument(state: EbookState, now: Date = new Date()): EbookDocument {
  const { config, outline } = state;
  const author = config.authorName.trim();

  const chapters: EbookChapter[] = [];
  state.chapters.forEach((chapter, index) => {
    const sections = chapter.editedSections.length ? chapter.editedSections : chapter.rawSections;
    if (!sections.length) return;
    chapters.push({
      number: index + 1,
      title: chapter.outline.chapterTitle,
      imagePath: chapter.sectionImagePaths[0] ?? null,
      sections: sections.map((s) => ({ title: s.sectionTitle, paragraphs: toParagraphs(s.sectionText) })),
    });
  });

  return {
    title: outline?.ebookTitle ?? config.title,
    subtitle: (outline ? outline.ebookSubtitle : config.subtitle) || '',
    authorName: author,
    coverImagePath: state.coverImagePath,
    copyrightLines: [
      `© ${now.getFullYear()}${author ? ` ${author}` : ''}. All rights reserved.`,
      'No part of this publication may be reproduced, distributed, or transmitted in any form without prior written permission.',
      `Generated ${dateFormat.format(now)}.`,
    ],
    introduction: toParagraphs(state.introductionText ?? ''),
    chapters,
    conclusion: toParagraphs(state.conclusionText ?? ''),
  };
}

/** The path when the file is there; a missing image is logged and skipped. */
async function existingImage(filePath: string | null): Promise<string | null> {
  if (!filePath) return null;
  try {
    await fs.access(filePath);
    return filePath;
  } catch {
    logger.warn(`Ebook image missing, skipped: ${filePath}`);
    return null;
  }
}

// ----- PDF layout -----

const PT_PER_MM = 72 / 25.4;
const MARGIN = Math.round(25 * PT_PER_MM);
const SERIF = 'Times-Roman';
const SANS = 'Helvetica';
const SANS_BOLD = 'Helvetica-Bold';
const BODY_COLOR = '#282828';
const MUTED_COLOR = '#999999';

interface TocEntry {
  label: string;
  pageIndex: number;
}

export class EbookRendererService implements EbookRenderer {
  constructor(private readonly outputDir: string = OUTPUT_DIRS.ebooks) {}

  private outputPath(title: string, extension: 'pdf' | 'docx'): string {
    return path.join(this.outputDir, `${slugify(title, 50)}_${fileTimestamp()}.${extension}`);
  }

  async renderPdf(state: EbookState): Promise<string> {
    const book = buildEbookDocument(state);
    await fs.mkdir(this.outputDir, { recursive: true });
    const outputPath = this.outputPath(state.config.title, 'pdf');

    const doc = new PDFDocument({
      size: 'A4',
      margin: MARGIN,
      bufferPages: true,
      info: { Title: book.title, Author: book.authorName || undefined },
    });
    const finished = new Promise<void>((resolve, reject) => {
      const stream = createWriteStream(outputPath);
      stream.on('finish', () => resolve());
      stream.on('error', reject);
      doc.on('error', reject);
      doc.pipe(stream);
    });
    const contentWidth = doc.page.width - MARGIN * 2;

    // Cover
    const coverImage = await existingImage(book.coverImagePath);
    if (coverImage) {
      doc.image(coverImage, { fit: [contentWidth, 150 * PT_PER_MM], align: 'center' });
      doc.moveDown(2);
    } else {
      doc.moveDown(8);
    }
    doc.font(SANS_BOLD).fontSize(28).fillColor('#1a1a1a').text(book.title, { align: 'center' });
    if (book.subtitle) {
      doc.moveDown(0.5).font(SANS).fontSize(15).fillColor('#555555').text(book.subtitle, { align: 'center' });
    }
    if (book.authorName) {
      doc.moveDown(1).font(SANS).fontSize(13).fillColor('#777777').text(`by ${book.authorName}`, { align: 'center' });
    }

    // Copyright
    doc.addPage();
    doc.y = doc.page.height * 0.45;
    doc.font(SERIF).fontSize(9).fillColor('#888888');
    for (const line of book.copyrightLines) doc.text(line, { align: 'center' }).moveDown(1);

    // Contents are written once page numbers are known
    doc.addPage();
    const tocPageIndex = doc.bufferedPageRange().count - 1;
    const firstNumberedPage = tocPageIndex + 1;
    const toc: TocEntry[] = [];

    const startPage = (label: string, heading: string, kicker?: string) => {
      doc.addPage();
      toc.push({ label, pageIndex: doc.bufferedPageRange().count - 1 });
      if (kicker) doc.font(SANS_BOLD).fontSize(14).fillColor(MUTED_COLOR).text(kicker.toUpperCase(), { characterSpacing: 2 });
      doc.font(SANS_BOLD).fontSize(24).fillColor('#1a1a1a').text(heading).moveDown(1);
    };
    const writeParagraphs = (paragraphs: string[]) => {
      doc.font(SERIF).fontSize(11).fillColor(BODY_COLOR);
      for (const p of paragraphs) doc.text(p, { align: 'justify', lineGap: 3, paragraphGap: 8 });
    };

    if (book.introduction.length) {
      startPage('Introduction', 'Introduction');
      writeParagraphs(book.introduction);
    }
    for (const chapter of book.chapters) {
      startPage(`Chapter ${chapter.number}: ${chapter.title}`, chapter.title, `Chapter ${chapter.number}`);
      const chapterImage = await existingImage(chapter.imagePath);
      if (chapterImage) {
        doc.image(chapterImage, { fit: [contentWidth * 0.65, 80 * PT_PER_MM], align: 'center' });
        doc.moveDown(1);
      }
      for (const section of chapter.sections) {
        doc.moveDown(1).font(SANS_BOLD).fontSize(15).fillColor('#333333').text(section.title).moveDown(0.5);
        writeParagraphs(section.paragraphs);
      }
    }
    if (book.conclusion.length) {
      startPage('Conclusion', 'Conclusion');
      writeParagraphs(book.conclusion);
    }

    // Contents, running header and page numbers
    doc.switchToPage(tocPageIndex);
    doc.font(SANS_BOLD).fontSize(22).fillColor('#1a1a1a').text('Table of Contents', MARGIN, MARGIN, { align: 'center' });
    doc.moveDown(1.5).font(SANS).fontSize(11).fillColor(BODY_COLOR);
    for (const entry of toc) {
      const y = doc.y;
      doc.text(entry.label, MARGIN, y, { width: contentWidth - 40 });
      const next = doc.y;
      doc.text(String(entry.pageIndex + 1), MARGIN, y, { width: contentWidth, align: 'right' });
      doc.y = next + 4;
    }

    const { count } = doc.bufferedPageRange();
    for (let i = firstNumberedPage; i < count; i++) {
      doc.switchToPage(i);
      const bottomMargin = doc.page.margins.bottom;
      doc.page.margins.bottom = 0;
      doc.font(SANS).fontSize(8).fillColor(MUTED_COLOR).text(book.title, MARGIN, MARGIN / 2, { width: contentWidth });
      doc.fontSize(9).text(String(i + 1), MARGIN, doc.page.height - MARGIN / 2, { width: contentWidth, align: 'center' });
      doc.page.margins.bottom = bottomMargin;
    }

    doc.end();
    await finished;
    logger.info(`PDF rendered: ${outputPath}`);
    return outputPath;
  }

  async renderDocx(state: EbookState): Promise<string> {
    const book = buildEbookDocument(state);
    await fs.mkdir(this.outputDir, { recursive: true });
    const outputPath = this.outputPath(state.config.title, 'docx');

    const children: (Paragraph | TableOfContents)[] = [];
    const pageBreak = () => children.push(new Paragraph({ children: [new PageBreak()] }));
    const body = (paragraphs: string[]) => {
      for (const text of paragraphs) children.push(new Paragraph({ text, spacing: { after: 120 } }));
    };
    const image = async (imagePath: string | null, width: number, height: number) => {
      const existing = await existingImage(imagePath);
      if (!existing) return;
      children.push(
        new Paragraph({
          alignment: AlignmentType.CENTER,
          children: [new ImageRun({ data: await fs.readFile(existing), transformation: { width, height } })],
        })
      );
    };

    // Cover (sizes in half-points)
    children.push(
      new Paragraph({
        alignment: AlignmentType.CENTER,
        children: [new TextRun({ text: book.title, bold: true, size: 56, color: '1E1E1E' })],
      })
    );
    if (book.subtitle) {
      children.push(
        new Paragraph({
          alignment: AlignmentType.CENTER,
          children: [new TextRun({ text: book.subtitle, italics: true, size: 32, color: '505050' })],
        })
      );
    }
    if (book.authorName) {
      children.push(
        new Paragraph({
          alignment: AlignmentType.CENTER,
          children: [new TextRun({ text: `by ${book.authorName}`, size: 28, color: '646464' })],
        })
      );
    }
    await image(book.coverImagePath, 384, 576);
    pageBreak();

    for (const line of book.copyrightLines) {
      children.push(
        new Paragraph({
          alignment: AlignmentType.CENTER,
          spacing: { after: 240 },
          children: [new TextRun({ text: line, size: 18, color: '787878' })],
        })
      );
    }
    pageBreak();

    children.push(new Paragraph({ text: 'Table of Contents', heading: HeadingLevel.HEADING_1 }));
    children.push(new TableOfContents('Table of Contents', { hyperlink: true, headingStyleRange: '1-2' }));
    pageBreak();

    if (book.introduction.length) {
      children.push(new Paragraph({ text: 'Introduction', heading: HeadingLevel.HEADING_1 }));
      body(book.introduction);
      pageBreak();
    }
    for (const chapter of book.chapters) {
      children.push(new Paragraph({ text: `Chapter ${chapter.number}: ${chapter.title}`, heading: HeadingLevel.HEADING_1 }));
      await image(chapter.imagePath, 384, 216);
      for (const section of chapter.sections) {
        children.push(new Paragraph({ text: section.title, heading: HeadingLevel.HEADING_2 }));
        body(section.paragraphs);
      }
      pageBreak();
    }
    if (book.conclusion.length) {
      children.push(new Paragraph({ text: 'Conclusion', heading: HeadingLevel.HEADING_1 }));
      body(book.conclusion);
    }

    const document = new Document({
      title: book.title,
      creator: book.authorName || undefined,
      features: { updateFields: true },
      sections: [{ children }],
    });
    await fs.writeFile(outputPath, await Packer.toBuffer(document));
    logger.info(`DOCX rendered: ${outputPath}`);
    return outputPath;
  }
}

export default new EbookRendererService();
