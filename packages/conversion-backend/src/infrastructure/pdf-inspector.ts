// packages/conversion-backend/src/infrastructure/pdf-inspector.ts
// Page counting for uploaded documents. Anything pdf-lib cannot parse yields
// null, which callers treat as "unknown page count".
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { PDFDocument } from 'pdf-lib';

import { logger } from './logger.js';

export async function getPdfPageCount(filePath: string): Promise<number | null> {
  if (path.extname(filePath).toLowerCase() !== '.pdf') return null;

  try {
    const bytes = await readFile(filePath);
    const document = await PDFDocument.load(bytes, {
      ignoreEncryption: true,
      updateMetadata: false,
    });
    return document.getPageCount();
  } catch (error) {
    logger.debug('PDF page count unavailable', {
      component: 'pdf-inspector',
      filePath,
      error: String(error),
    });
    return null;
  }
}
