/**
 * The slice of the pdf.js API the PDF loader relies on. Code takes a
 * `PdfjsLib` instead of importing pdf.js directly so tests can hand in a
 * fake document.
 */
export interface PdfjsLib {
  getDocument(src: DocumentInitParameters): PDFDocumentLoadingTask;
}

export interface DocumentInitParameters {
  data?: Uint8Array;
  verbosity?: number; // 0 = errors only, 1 = warnings, 5 = all
  cMapPacked?: boolean;
  cMapUrl?: string;
  standardFontDataUrl?: string;
  isEvalSupported?: boolean;
}

export interface PDFDocumentLoadingTask {
  promise: Promise<PDFDocumentProxy>;
  destroy(): Promise<void>;
}

export interface PDFDocumentProxy {
  numPages: number;
  getPage(pageNumber: number): Promise<PDFPageProxy>;
  getMetadata(): Promise<PDFMetadata>;
  destroy(): Promise<void>;
}

export interface PDFMetadata {
  info: object; // Document information dictionary (Title, Author, ...)
}

export interface PDFPageProxy {
  getTextContent(): Promise<TextContent>;
}

export interface TextContent {
  items: (TextItem | TextMarkedContent)[];
}

export interface TextItem {
  str: string;
  hasEOL: boolean;
}

export interface TextMarkedContent {
  type: string;
  id?: string;
}

/**
 * Loads the legacy build of pdf.js, which runs under Node without DOM APIs
 */
export async function loadPdfjs(): Promise<PdfjsLib> {
  const pdfjs: PdfjsLib = await import('pdfjs-dist/legacy/build/pdf.mjs');
  return pdfjs;
}
