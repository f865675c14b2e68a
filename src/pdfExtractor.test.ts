import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { ExtractionError } from './errors';
import {
  extractPdfMetadata,
  extractPdfText,
  extractTextFromBuffer,
  findPageForOffset,
  findPdfFiles,
  normalizeText,
  processPdfDirectory,
  type PdfExtractResult,
} from './pdfExtractor';
import {
  ENCRYPTED_PDF,
  fakePdfContent,
  fakePdfjs,
} from './test-helpers/fake-pdfjs';
import { createTempDir, removeTempDir } from './test-helpers/tmp-dir';

const MANUAL = fakePdfContent({
  pages: [['Hello  world', 'Second line'], ['Page two']],
  info: { Title: 'User Manual', Author: 'Support Team', Pages: 2 },
});

let dir: string;

beforeEach(async () => {
  dir = await createTempDir();
});

afterEach(async () => {
  await removeTempDir(dir);
});

async function writeFile(relative: string, content: string): Promise<string> {
  const filePath = path.join(dir, relative);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  return filePath;
}

async function rejection(promise: Promise<unknown>): Promise<ExtractionError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ExtractionError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the promise to reject');
}

describe('pdfExtractor', () => {
  describe('normalizeText', () => {
    it('normalizes Unicode (NFKC)', () => {
      // Full-width characters to half-width
      expect(normalizeText('ＡＢＣ')).toBe('ABC');
      expect(normalizeText('１２３')).toBe('123');
    });

    it('collapses multiple spaces', () => {
      expect(normalizeText('hello    world')).toBe('hello world');
      expect(normalizeText('a  b   c    d')).toBe('a b c d');
    });

    it('normalizes various whitespace to space', () => {
      expect(normalizeText('hello\tworld')).toBe('hello world');
      expect(normalizeText('hello\r\nworld')).toBe('hello\nworld');
    });

    it('collapses multiple newlines to at most two', () => {
      expect(normalizeText('a\n\n\nb')).toBe('a\n\nb');
      expect(normalizeText('a\n\n\n\n\nb')).toBe('a\n\nb');
    });

    it('trims whitespace from each line', () => {
      expect(normalizeText('  hello  \n  world  ')).toBe('hello\nworld');
    });

    it('handles string with only whitespace', () => {
      expect(normalizeText('   \n\n\t  ')).toBe('');
    });
  });

  describe('extractTextFromBuffer', () => {
    let result: PdfExtractResult;

    beforeEach(async () => {
      result = await extractTextFromBuffer(
        new TextEncoder().encode(MANUAL),
        fakePdfjs
      );
    });

    it('joins normalized pages with newlines', () => {
      expect(result.fullText).toBe('Hello world\nSecond line\nPage two');
      expect(result.rawFullText).toBe(
        'Hello  world\nSecond line\n\nPage two\n'
      );
    });

    it('numbers pages and records their offsets', () => {
      expect(
        result.pages.map(p => [p.pageNumber, p.startOffset])
      ).toEqual([
        [1, 0],
        [2, 24],
      ]);
    });

    it('maps text offsets back to pages', () => {
      expect(findPageForOffset(result.pages, 0)).toBe(1);
      expect(findPageForOffset(result.pages, 23)).toBe(1);
      expect(findPageForOffset(result.pages, 24)).toBe(2);
      expect(findPageForOffset(result.pages, -1)).toBeUndefined();
    });
  });

  describe('extractPdfText', () => {
    it('reads a file from disk', async () => {
      const filePath = await writeFile('manual.pdf', MANUAL);
      expect(await extractPdfText(filePath, { pdfjsLib: fakePdfjs })).toBe(
        'Hello world\nSecond line\nPage two'
      );
    });

    it('classifies a missing file', async () => {
      const error = await rejection(
        extractPdfText(path.join(dir, 'nope.pdf'), { pdfjsLib: fakePdfjs })
      );
      expect(error.kind).toBe('missing-file');
    });

    it('classifies an encrypted file', async () => {
      const filePath = await writeFile('locked.pdf', ENCRYPTED_PDF);
      const error = await rejection(
        extractPdfText(filePath, { pdfjsLib: fakePdfjs })
      );
      expect(error.kind).toBe('encrypted');
      expect(error.message).toBe(`PDF is encrypted: ${filePath}`);
    });

    it('classifies a file that is not a PDF', async () => {
      const filePath = await writeFile('notes.pdf', 'just some text');
      const error = await rejection(
        extractPdfText(filePath, { pdfjsLib: fakePdfjs })
      );
      expect(error.kind).toBe('invalid-pdf');
    });
  });

  describe('extractPdfMetadata', () => {
    it('returns string fields with empty defaults and the page count', async () => {
      const filePath = await writeFile('manual.pdf', MANUAL);
      expect(
        await extractPdfMetadata(filePath, { pdfjsLib: fakePdfjs })
      ).toEqual({
        title: 'User Manual',
        author: 'Support Team',
        subject: '',
        keywords: '',
        creator: '',
        producer: '',
        pages: 2,
      });
    });
  });

  describe('processPdfDirectory', () => {
    beforeEach(async () => {
      await writeFile('a.pdf', MANUAL);
      await writeFile('broken.pdf', 'not a pdf');
      await writeFile('notes.txt', MANUAL);
      await writeFile('sub/B.PDF', fakePdfContent({ pages: [['Nested']] }));
      await writeFile('.hidden/c.pdf', MANUAL);
    });

    it('finds PDFs recursively, skipping hidden directories', async () => {
      expect(await findPdfFiles(dir)).toEqual([
        path.join(dir, 'a.pdf'),
        path.join(dir, 'broken.pdf'),
        path.join(dir, 'sub', 'B.PDF'),
      ]);
    });

    it('loads every readable PDF and records the failures', async () => {
      const result = await processPdfDirectory(dir, { pdfjsLib: fakePdfjs });

      expect(result.documents.map(d => [d.filePath, d.text])).toEqual([
        [path.join(dir, 'a.pdf'), 'Hello world\nSecond line\nPage two'],
        [path.join(dir, 'sub', 'B.PDF'), 'Nested'],
      ]);
      expect(result.documents[0].metadata.title).toBe('User Manual');
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0].filePath).toBe(path.join(dir, 'broken.pdf'));
      expect(result.failures[0].error.kind).toBe('invalid-pdf');
    });

    it('fails on a missing directory', async () => {
      const error = await rejection(
        processPdfDirectory(path.join(dir, 'missing'), {
          pdfjsLib: fakePdfjs,
        })
      );
      expect(error.kind).toBe('missing-file');
    });
  });
});
