import { readFile } from 'node:fs/promises';
import { PDFDocument } from 'pdf-lib';
import { CompositeFailure } from '../core/errors.js';

/**
 * Places the first page of `contentBytes` over the first page of the
 * letterhead, anchored top-left, in a new document. The content page has no
 * background, so the letterhead shows through wherever nothing is drawn.
 */
export async function compositeOnLetterhead(
  contentBytes: Uint8Array,
  letterheadBytes: Uint8Array,
  letterheadPath: string
): Promise<Uint8Array> {
  try {
    const letterhead = await PDFDocument.load(letterheadBytes);
    if (letterhead.getPageCount() === 0) {
      throw new Error('letterhead has no pages');
    }

    const output = await PDFDocument.create();
    const [base] = await output.copyPages(letterhead, [0]);
    if (!base) throw new Error('letterhead page could not be copied');
    output.addPage(base);

    const [content] = await output.embedPdf(contentBytes, [0]);
    if (!content) throw new Error('content page could not be embedded');

    base.drawPage(content, { x: 0, y: base.getHeight() - content.height });
    output.setCreator('receipt-compositor');
    output.setProducer('receipt-compositor');
    return await output.save();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CompositeFailure(letterheadPath, `Could not composite onto ${letterheadPath}: ${message}`, { cause: error });
  }
}

export async function compositeOnLetterheadFile(contentBytes: Uint8Array, letterheadPath: string): Promise<Uint8Array> {
  let letterheadBytes: Uint8Array;
  try {
    letterheadBytes = await readFile(letterheadPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CompositeFailure(letterheadPath, `Could not read letterhead ${letterheadPath}: ${message}`, { cause: error });
  }
  return compositeOnLetterhead(contentBytes, letterheadBytes, letterheadPath);
}
