import logger from 'jet-logger';
import mammoth from 'mammoth';

import { describeError, fail, ok, Result } from '@src/common/util/failures';


export type ExtractTextFn = (content: Buffer, fileType: string) => Promise<Result<string>>;

// pdfjs loads on the first PDF; the parser's document is always released
async function extractFromPDF(content: Buffer): Promise<string> {
  const { PDFParse } = await import('pdf-parse');
  const parser = new PDFParse({ data: new Uint8Array(content) });
  try {
    const result = await parser.getText();
    const pages = result.pages.map((page) => page.text);
    const text = pages.join('\n\n');
    logger.info(`Extracted ${text.length} characters from PDF with ${pages.length} pages`);
    return text;
  } finally {
    await parser.destroy();
  }
}

async function extractFromWord(content: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: content });
  const paragraphs = result.value
    .split(/\r?\n/)
    .filter((paragraph) => paragraph.trim() !== '');
  const text = paragraphs.join('\n');
  logger.info(`Extracted ${text.length} characters from DOCX with ${paragraphs.length} paragraphs`);
  return text;
}

function extractFromTXT(content: Buffer): string {
  // fatal: reject invalid UTF-8 instead of inserting replacement characters
  const text = new TextDecoder('utf-8', { fatal: true }).decode(content);
  logger.info(`Extracted ${text.length} characters from TXT file`);
  return text;
}

async function run(format: string, fn: () => Promise<string> | string): Promise<Result<string>> {
  try {
    return ok(await fn());
  } catch (err) {
    const message = `Failed to extract text from ${format}: ${describeError(err)}`;
    logger.err(message);
    return fail('TextExtractionFailure', message, { cause: err });
  }
}

/**
 * Turn uploaded bytes into plain text according to the declared file type
 * (pdf, docx, doc or txt; case-insensitive).
 */
export const extractText: ExtractTextFn = async (content, fileType) => {
  switch (fileType.toLowerCase()) {
    case 'pdf':
      return run('PDF', () => extractFromPDF(content));
    case 'docx':
    case 'doc':
      return run('DOCX', () => extractFromWord(content));
    case 'txt':
      return run('TXT', () => extractFromTXT(content));
    default:
      return fail('UnsupportedFormat', `Unsupported file type: ${fileType}`);
  }
};
