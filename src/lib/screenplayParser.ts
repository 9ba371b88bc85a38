import type { LineType, ParsedScreenplay, Scene, SceneSetting } from './scheduleTypes';

// Scene heading: INT. or EXT. at the start of the trimmed line (case-insensitive)
const HEADING_RE = /^(?:INT|EXT)\./i;
const INTERIOR_RE = /^INT\./i;
// Character cue: ALL CAPS, may include spaces and some punctuation
const CHARACTER_RE = /^[A-Z0-9 .'\-()]+$/;
// Transition: ends with TO:, e.g., CUT TO:
const TRANSITION_RE = /^[A-Z ]+\s+TO:$/;
// Parenthetical: ( ... )
const PAREN_RE = /^\(.+\)$/;
// Lyric: ~ at start
const LYRIC_RE = /^~.+$/;

export function isSceneHeading(line: string): boolean {
  return HEADING_RE.test(line.trim());
}

export function settingOf(heading: string): SceneSetting {
  return INTERIOR_RE.test(heading.trim()) ? 'interior' : 'exterior';
}

function classify(t: string, prev?: LineType): LineType {
  if (t.length === 0) return 'blank';
  if (TRANSITION_RE.test(t)) return 'transition';
  if (PAREN_RE.test(t)) return 'parenthetical';
  if (LYRIC_RE.test(t)) return 'lyric';

  // Dialogue runs from a cue (or parenthetical) until the next blank line
  if (prev === 'character' || prev === 'parenthetical' || prev === 'dialogue') return 'dialogue';

  if (t.length <= 40 && CHARACTER_RE.test(t) && /[A-Z]/.test(t)) return 'character';

  return 'action';
}

/**
 * Classify each trimmed body line of a scene. Blank lines close a dialogue
 * block, so a cue must be followed directly by its speech.
 */
export function classifyBodyLines(bodyLines: string[]): LineType[] {
  const types: LineType[] = [];
  for (const line of bodyLines) {
    types.push(classify(line, types[types.length - 1]));
  }
  return types;
}

export function makeScene(
  index: number,
  heading: string,
  bodyLines: string[],
  types: LineType[] = classifyBodyLines(bodyLines)
): Scene {
  return {
    index,
    heading,
    setting: settingOf(heading),
    bodyLines,
    actionLines: types.filter(t => t === 'action').length,
    dialogueLines: types.filter(t => t === 'dialogue').length,
  };
}

/**
 * Split screenplay text into scenes. Every line that starts with INT. or EXT.
 * opens a scene; everything up to the next heading is its body. Text ahead of
 * the first heading is dropped with a warning.
 */
export function parseScreenplay(text: string): ParsedScreenplay {
  const rawLines = text.split(/\r\n|\r|\n/);
  // A final newline ends the last line rather than opening an empty one
  if (rawLines[rawLines.length - 1] === '') rawLines.pop();
  const scenes: Scene[] = [];
  const warnings: string[] = [];

  let heading: string | null = null;
  let body: string[] = [];

  const flushScene = () => {
    if (heading === null) return;
    scenes.push(makeScene(scenes.length + 1, heading, body));
    heading = null;
    body = [];
  };

  for (let i = 0; i < rawLines.length; i++) {
    const t = rawLines[i].trim();
    if (HEADING_RE.test(t)) {
      flushScene();
      heading = t;
    } else if (heading !== null) {
      body.push(t);
    } else if (t.length > 0 && warnings.length === 0) {
      warnings.push(`Content before first scene heading detected near line ${i + 1}. It was skipped.`);
    }
  }
  flushScene();

  return { scenes, warnings };
}

/** Ordered scenes only, for callers that have no use for warnings. */
export function parseScenes(text: string): Scene[] {
  return parseScreenplay(text).scenes;
}
