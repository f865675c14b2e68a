import fs from 'fs/promises';
import path from 'path';
import {
  ExtractionError,
  type Result,
  err,
  errorMessage,
  isNotFound,
  ok,
} from './errors';
import { type PDFDocumentProxy, type PdfjsLib, loadPdfjs } from './pdfjs';
import { formatDuration } from './utils';
import type { ComponentLogger } from './WithLogging';

export interface PdfPage {
  pageNumber: number;
  rawText: string;
  normalizedText: string;
  startOffset: number;
}

export interface PdfExtractResult {
  pages: PdfPage[];
  fullText: string;
  rawFullText: string;
}

export interface PdfMetadata {
  title: string;
  author: string;
  subject: string;
  keywords: string;
  creator: string;
  producer: string;
  pages: number;
}

export interface PdfDocument {
  filePath: string;
  text: string;
  metadata: PdfMetadata;
}

export interface PdfFailure {
  filePath: string;
  error: ExtractionError;
}

export interface PdfDirectoryResult {
  documents: PdfDocument[];
  failures: PdfFailure[];
}

export interface PdfLoadOptions {
  /** Defaults to the legacy Node build of pdf.js */
  pdfjsLib?: PdfjsLib;
  logger?: ComponentLogger;
}

// Testable entry point - accepts dependencies
export async function extractTextFromBuffer(
  data: Uint8Array,
  pdfjsLib: PdfjsLib,
  options?: { logger?: ComponentLogger }
): Promise<PdfExtractResult> {
  const startTime = Date.now();
  const logger = options?.logger;

  const doc = await openDocument(data, pdfjsLib);
  try {
    const result = await extractTextFromDocument(doc);
    const duration = formatDuration(Date.now() - startTime);
    logger?.verbose(
      `Extracted ${result.fullText.length} characters from ${result.pages.length} pages in ${duration}`
    );
    return result;
  } finally {
    await doc.destroy();
  }
}

function openDocument(
  data: Uint8Array,
  pdfjsLib: PdfjsLib
): Promise<PDFDocumentProxy> {
  return pdfjsLib.getDocument({
    data,
    verbosity: 0, // Suppress warnings (0 = errors only)
    isEvalSupported: false,
  }).promise;
}

export async function extractTextFromDocument(
  doc: PDFDocumentProxy
): Promise<PdfExtractResult> {
  const pages: PdfPage[] = [];
  let currentOffset = 0;

  for (let pageNum = 1; pageNum <= doc.numPages; pageNum++) {
    const page = await doc.getPage(pageNum);
    const textContent = await page.getTextContent();

    const textParts: string[] = [];
    for (const item of textContent.items) {
      // Marked-content items carry no text
      if ('str' in item && item.str) {
        textParts.push(item.str);
        if (item.hasEOL) {
          textParts.push('\n');
        }
      }
    }
    const rawText = textParts.join('');
    const normalizedText = normalizeText(rawText);

    pages.push({
      pageNumber: pageNum,
      rawText,
      normalizedText,
      startOffset: currentOffset,
    });

    currentOffset += normalizedText.length + 1; // +1 for page separator
  }

  const rawFullText = pages.map(p => p.rawText).join('\n');
  const fullText = pages.map(p => p.normalizedText).join('\n');

  return { pages, fullText, rawFullText };
}

export async function extractMetadataFromDocument(
  doc: PDFDocumentProxy
): Promise<PdfMetadata> {
  const { info } = await doc.getMetadata();
  const fields = new Map<string, unknown>(Object.entries(info));
  const field = (key: string): string => {
    const value = fields.get(key);
    return typeof value === 'string' ? value : '';
  };
  return {
    title: field('Title'),
    author: field('Author'),
    subject: field('Subject'),
    keywords: field('Keywords'),
    creator: field('Creator'),
    producer: field('Producer'),
    pages: doc.numPages,
  };
}

export function normalizeText(text: string): string {
  // Unicode normalization (NFKC)
  let normalized = text.normalize('NFKC');

  // Normalize whitespace: convert various whitespace characters to regular space
  normalized = normalized.replace(/[\t\r\f\v]+/g, ' ');

  // Collapse multiple spaces into one
  normalized = normalized.replace(/ {2,}/g, ' ');

  // Normalize line breaks: collapse multiple newlines into at most two
  normalized = normalized.replace(/\n{3,}/g, '\n\n');

  // Remove leading/trailing whitespace from each line
  normalized = normalized
    .split('\n')
    .map(line => line.trim())
    .join('\n');

  // Remove leading/trailing whitespace from entire text
  normalized = normalized.trim();

  return normalized;
}

export function findPageForOffset(
  pages: PdfPage[],
  offset: number
): number | undefined {
  for (let i = pages.length - 1; i >= 0; i--) {
    if (offset >= pages[i].startOffset) {
      return pages[i].pageNumber;
    }
  }
  return undefined;
}

/**
 * Maps a pdf.js failure onto an extraction error kind. pdf.js signals
 * password-protected and malformed files by exception name.
 */
export function classifyPdfError(
  error: unknown,
  filePath: string
): ExtractionError {
  if (error instanceof ExtractionError) {
    return error;
  }
  const name = error instanceof Error ? error.name : '';
  switch (name) {
    case 'PasswordException':
      return new ExtractionError(
        `PDF is encrypted: ${filePath}`,
        filePath,
        'encrypted',
        { cause: error }
      );
    case 'InvalidPDFException':
      return new ExtractionError(
        `Not a valid PDF: ${filePath}`,
        filePath,
        'invalid-pdf',
        { cause: error }
      );
    default:
      return new ExtractionError(
        `Failed to parse PDF ${filePath}: ${errorMessage(error)}`,
        filePath,
        'unknown',
        { cause: error }
      );
  }
}

async function readPdfFile(filePath: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await fs.readFile(filePath));
  } catch (error) {
    if (isNotFound(error)) {
      throw new ExtractionError(
        `PDF file not found: ${filePath}`,
        filePath,
        'missing-file',
        { cause: error }
      );
    }
    throw classifyPdfError(error, filePath);
  }
}

async function withPdfDocument<T>(
  filePath: string,
  options: PdfLoadOptions,
  fn: (doc: PDFDocumentProxy) => Promise<T>
): Promise<T> {
  const data = await readPdfFile(filePath);
  const pdfjsLib = options.pdfjsLib ?? (await loadPdfjs());
  let doc: PDFDocumentProxy;
  try {
    doc = await openDocument(data, pdfjsLib);
  } catch (error) {
    throw classifyPdfError(error, filePath);
  }
  try {
    return await fn(doc);
  } catch (error) {
    throw classifyPdfError(error, filePath);
  } finally {
    await doc.destroy();
  }
}

/**
 * Text of every page, normalized, one page per line block
 *
 * @throws ExtractionError classified as missing-file, encrypted, invalid-pdf or unknown
 */
export async function extractPdfText(
  filePath: string,
  options: PdfLoadOptions = {}
): Promise<string> {
  return withPdfDocument(filePath, options, async doc => {
    const result = await extractTextFromDocument(doc);
    options.logger?.verbose(
      `Extracted ${result.fullText.length} characters from ${result.pages.length} pages of ${filePath}`
    );
    return result.fullText;
  });
}

/**
 * Document information fields (empty strings when absent) and page count
 *
 * @throws ExtractionError classified as missing-file, encrypted, invalid-pdf or unknown
 */
export async function extractPdfMetadata(
  filePath: string,
  options: PdfLoadOptions = {}
): Promise<PdfMetadata> {
  return withPdfDocument(filePath, options, extractMetadataFromDocument);
}

/**
 * Text and metadata of one PDF, read in a single pass
 */
export async function loadPdfDocument(
  filePath: string,
  options: PdfLoadOptions = {}
): Promise<Result<PdfDocument, ExtractionError>> {
  try {
    const document = await withPdfDocument(filePath, options, async doc => ({
      filePath,
      text: (await extractTextFromDocument(doc)).fullText,
      metadata: await extractMetadataFromDocument(doc),
    }));
    return ok(document);
  } catch (error) {
    return err(classifyPdfError(error, filePath));
  }
}

/**
 * Every `*.pdf` (any case) under `dir`, in sorted path order; hidden
 * directories are not entered
 */
export async function findPdfFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!entry.name.startsWith('.')) {
        files.push(...(await findPdfFiles(fullPath)));
      }
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.pdf')) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Loads every PDF under `dir`. Files that fail are recorded in `failures`
 * and skipped.
 *
 * @throws ExtractionError (missing-file) if `dir` is not a directory
 */
export async function processPdfDirectory(
  dir: string,
  options: PdfLoadOptions = {}
): Promise<PdfDirectoryResult> {
  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(dir)).isDirectory();
  } catch (error) {
    if (!isNotFound(error)) {
      throw classifyPdfError(error, dir);
    }
  }
  if (!isDirectory) {
    throw new ExtractionError(
      `Directory not found: ${dir}`,
      dir,
      'missing-file'
    );
  }

  const files = await findPdfFiles(dir);
  const pdfjsLib = options.pdfjsLib ?? (await loadPdfjs());
  const documents: PdfDocument[] = [];
  const failures: PdfFailure[] = [];

  for (const filePath of files) {
    const loaded = await loadPdfDocument(filePath, { ...options, pdfjsLib });
    if (loaded.ok) {
      documents.push(loaded.value);
    } else {
      options.logger?.warn(`Skipping ${filePath}: ${loaded.error.message}`);
      failures.push({ filePath, error: loaded.error });
    }
  }

  options.logger?.log(
    `Loaded ${documents.length} of ${files.length} PDF(s) from ${dir}`
  );
  return { documents, failures };
}
