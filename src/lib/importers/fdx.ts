import { XMLParser } from 'fast-xml-parser';
import type { LineType, ParsedScreenplay, Scene } from '@/lib/scheduleTypes';
import { makeScene } from '@/lib/screenplayParser';

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function toLineTypeFromFDX(elemType: string): LineType {
  // Map FDX elements to our types
  switch (elemType) {
    case 'Action': return 'action';
    case 'Character': return 'character';
    case 'Parenthetical': return 'parenthetical';
    case 'Dialogue': return 'dialogue';
    case 'Transition': return 'transition';
    case 'Lyrics': return 'lyric';
    default: return 'action';
  }
}

function coerceText(x: unknown): string {
  if (x == null) return '';
  if (typeof x === 'string') return x;
  if (typeof x === 'number' || typeof x === 'boolean') return String(x);
  // Styled runs arrive as several <Text> nodes
  if (Array.isArray(x)) return x.map(coerceText).join('');
  // Some FDX text is { '#text': '...', Style: '...' }
  if (isRecord(x)) return coerceText(x['#text']);
  return '';
}

export function importFdxToScenes(xml: string): ParsedScreenplay {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    textNodeName: '#text',
    parseTagValue: false,
    // Styled runs carry their own spacing; lines are trimmed after joining
    trimValues: false,
    isArray: (name: string) => name === 'Paragraph' || name === 'Text',
  });

  const json: unknown = parser.parse(xml || '');
  const fd = isRecord(json) ? json.FinalDraft : undefined;
  if (!isRecord(fd)) {
    return { scenes: [], warnings: ['Not a valid .fdx file (no <FinalDraft> root).'] };
  }

  const content = fd.Content;
  const list: unknown[] = isRecord(content) && Array.isArray(content.Paragraph) ? content.Paragraph : [];

  const scenes: Scene[] = [];
  const warnings: string[] = [];
  let heading: string | null = null;
  let lines: string[] = [];
  let types: LineType[] = [];

  const flush = () => {
    if (heading === null) return;
    scenes.push(makeScene(scenes.length + 1, heading, lines, types));
    heading = null;
    lines = [];
    types = [];
  };

  for (const p of list) {
    if (!isRecord(p)) continue;
    const type = typeof p.Type === 'string' ? p.Type : 'Action';
    const text = coerceText(p.Text).trim();

    if (type === 'Scene Heading') {
      flush();
      heading = text || `UNTITLED SCENE ${scenes.length + 1}`;
    } else if (heading !== null) {
      lines.push(text);
      types.push(text ? toLineTypeFromFDX(type) : 'blank');
    } else if (text && warnings.length === 0) {
      warnings.push('FDX content before first Scene Heading was skipped.');
    }
  }
  flush();

  return { scenes, warnings };
}
