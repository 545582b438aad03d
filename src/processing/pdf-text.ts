/**
 * PDF exhibit text extraction.
 *
 * Only the first pages are read: exhibits that mention crypto assets do so
 * early, and full extraction of long PDFs dominates scan time. The PDF
 * library is loaded on first use so runs without PDF scanning never pay for it.
 */

export const PDF_MAX_PAGES = 10;

export async function extractPdfText(data: Uint8Array, maxPages: number = PDF_MAX_PAGES): Promise<string> {
  const { getDocumentProxy } = await import('unpdf');
  const pdf = await getDocumentProxy(new Uint8Array(data));

  try {
    const pages = Math.min(maxPages, pdf.numPages);
    const parts: string[] = [];
    for (let pageNumber = 1; pageNumber <= pages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      const line = content.items
        .map(item => ('str' in item ? item.str : ''))
        .join(' ');
      parts.push(line);
    }
    return parts.join('\n');
  } finally {
    await pdf.destroy();
  }
}
