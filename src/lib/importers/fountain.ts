import type { ParsedScreenplay } from '@/lib/scheduleTypes';
import { parseScreenplay } from '@/lib/screenplayParser';

/**
 * Fountain / plain-text importer (dependency-free)
 * Reuses the heading-based parser; Fountain markup beyond INT./EXT. headings
 * is counted as body text.
 */
export async function importFountainToScenes(text: string): Promise<ParsedScreenplay> {
  return Promise.resolve(parseScreenplay(text || ''));
}
