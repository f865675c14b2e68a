import type { PDFDocumentProxy, PdfjsLib, TextContent } from '../pdfjs';

/**
 * Stand-in for pdf.js that reads a JSON description instead of PDF syntax.
 * Files written with {@link fakePdfContent} open as documents whose pages
 * hold the given lines; {@link ENCRYPTED_PDF} fails like a password-protected
 * file, and anything else fails like a malformed one.
 */
export interface FakePdfLayout {
  pages: string[][]; // Lines of text per page
  info?: Record<string, unknown>;
}

const HEADER = '%PDF-FAKE\n';
export const ENCRYPTED_PDF = '%PDF-FAKE-ENCRYPTED';

export function fakePdfContent(layout: FakePdfLayout): string {
  return HEADER + JSON.stringify(layout);
}

function namedError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

function toDocument(layout: FakePdfLayout): PDFDocumentProxy {
  return {
    numPages: layout.pages.length,
    getPage: async pageNumber => ({
      getTextContent: async (): Promise<TextContent> => ({
        items: [
          { type: 'beginMarkedContent' },
          ...layout.pages[pageNumber - 1].map(str => ({ str, hasEOL: true })),
          { type: 'endMarkedContent' },
        ],
      }),
    }),
    getMetadata: async () => ({ info: layout.info ?? {} }),
    destroy: async () => {},
  };
}

async function parse(data: Uint8Array | undefined): Promise<PDFDocumentProxy> {
  const text = new TextDecoder().decode(data);
  if (text.startsWith(ENCRYPTED_PDF)) {
    throw namedError('PasswordException', 'No password given');
  }
  if (!text.startsWith(HEADER)) {
    throw namedError('InvalidPDFException', 'Invalid PDF structure.');
  }
  const layout: FakePdfLayout = JSON.parse(text.slice(HEADER.length));
  return toDocument(layout);
}

export const fakePdfjs: PdfjsLib = {
  getDocument: src => ({
    promise: parse(src.data),
    destroy: async () => {},
  }),
};
