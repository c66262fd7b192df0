import pdfParse from 'pdf-parse';

/**
 * Turns a document's bytes into page texts. Pages that cannot be read come
 * back empty rather than failing the whole document.
 */
export interface TextExtractor {
  extractPages(data: Uint8Array): Promise<string[]>;
}

// pdf-parse writes a blank line before every rendered page
const PAGE_SEPARATOR = '\n\n';

export function splitPages(text: string): string[] {
  return text.split(PAGE_SEPARATOR).slice(1);
}

export class PdfTextExtractor implements TextExtractor {
  async extractPages(data: Uint8Array): Promise<string[]> {
    const result = await pdfParse(Buffer.from(data));
    const pages = splitPages(result.text);
    console.log(`Extracted ${pages.length}/${result.numpages} pages`);
    return pages;
  }
}
