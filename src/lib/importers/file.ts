import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { ParsedScreenplay } from '@/lib/scheduleTypes';
import { parseScreenplay } from '@/lib/screenplayParser';
import { extractDocxText } from './docx';
import { importFdxToScenes } from './fdx';
import { importFountainToScenes } from './fountain';

export class ScreenplayImportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScreenplayImportError';
  }
}

async function importByExtension(filePath: string, ext: string): Promise<ParsedScreenplay> {
  if (ext === 'fountain' || ext === 'txt') {
    return importFountainToScenes(await readFile(filePath, 'utf8'));
  }
  if (ext === 'fdx') {
    return importFdxToScenes(await readFile(filePath, 'utf8'));
  }
  if (ext === 'docx') {
    return parseScreenplay(await extractDocxText(await readFile(filePath)));
  }
  if (ext === 'doc') {
    throw new ScreenplayImportError('Legacy .doc files are not supported. Save as .docx and try again.');
  }
  throw new ScreenplayImportError(`Unsupported file type "${ext}". Use .fountain, .txt, .fdx or .docx`);
}

/** Read a screenplay file and split it into scenes, picking the importer by extension. */
export async function loadScreenplayFile(filePath: string): Promise<ParsedScreenplay> {
  const ext = extname(filePath).slice(1).toLowerCase();

  let parsed: ParsedScreenplay;
  try {
    parsed = await importByExtension(filePath, ext);
  } catch (err) {
    console.error('[Importer] Failed to import script:', err);
    if (err instanceof ScreenplayImportError) throw err;
    const msg = err instanceof Error ? err.message : String(err);
    throw new ScreenplayImportError(`Failed to import ${filePath}: ${msg}`, { cause: err });
  }

  if (!parsed.scenes.length) {
    console.warn('[Importer] No scenes detected:', filePath);
  }
  return parsed;
}
