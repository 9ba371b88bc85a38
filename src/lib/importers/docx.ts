// src/lib/importers/docx.ts
// DOCX text extraction with Mammoth's Node build.
import * as mammoth from 'mammoth';

export async function extractDocxText(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  const text = (result.value || '').trim();

  // Normalize newlines so downstream parsers behave consistently
  return text.replace(/\r\n/g, '\n');
}
