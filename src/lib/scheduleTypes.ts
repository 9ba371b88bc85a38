export type LineType =
  | 'action'       // Action/description
  | 'character'    // Character cue (ALL CAPS)
  | 'parenthetical'// (whispering)
  | 'dialogue'     // Dialogue lines
  | 'transition'   // CUT TO:, FADE OUT:
  | 'lyric'        // ~ lyrics
  | 'blank';

export type SceneSetting = 'interior' | 'exterior';

export type Scene = {
  index: number;           // 1-based order in the script
  heading: string;         // heading line as written (trimmed)
  setting: SceneSetting;   // INT. => interior, anything else exterior
  bodyLines: string[];     // trimmed lines until next heading ('' for blanks)
  actionLines: number;     // non-blank lines classified as action
  dialogueLines: number;   // lines classified as dialogue
};

export type ParsedScreenplay = {
  scenes: Scene[];
  warnings: string[];
};

export type PageCount = {
  fullPages: number;
  eighths: number;         // 0..7 after carry
};

export type SceneDuration = {
  wordCount: number;
  pages: number;           // fractional pages
  pageCount: PageCount;
  pageLabel: string;       // "1 3/8", "3/8", "2" or "0"
  baseSeconds: number;     // screen time, ~60s per page
  setupCount: number;      // 1..20
  totalSeconds: number;    // baseSeconds + setups
};

export type LunchMode = 'auto' | 'fixed';

/** Seconds since midnight of the shoot day. May run past 24h on long days. */
export type ClockSeconds = number;

export type DayConfig = {
  startTime: ClockSeconds;
  wordsPerPage: number;
  setupMinutes: number;
  lunchMode: LunchMode;
  fixedLunchHours: number; // only read in 'fixed' mode
  lunchDurationMinutes: number;
  includeExtras: boolean;  // lunch & moves count toward totals/wrap
  moveCount: number;
  moveDurationMinutes: number;
  lockDefaultSetups: boolean;
};

export type SceneTime = {
  sceneIndex: number;      // 0-based position in the duration list
  startClock: ClockSeconds;
  endClock: ClockSeconds;
};

export type LunchPlacement = {
  afterSceneIndex: number | null; // null when no scene precedes lunch
  startClock: ClockSeconds;
  endClock: ClockSeconds;
};

export type ScheduleResult = {
  sceneTimes: SceneTime[];
  totalSceneSeconds: number;
  lunchPlacement: LunchPlacement | null;
  totalDaySeconds: number;
  wrapClock: ClockSeconds;
};

export type SummaryKind = 'lunch' | 'total' | 'wrap';

export type SummaryPosition =
  | { type: 'after'; sceneIndex: number }
  | { type: 'append' };

export type SummaryEntry = {
  kind: SummaryKind;
  position: SummaryPosition;
  displayText: string;
};

export type SceneRow = {
  type: 'scene';
  number: number;
  sceneIndex: number;
  heading: string;
  actionLines: number;
  dialogueLines: number;
  pageLabel: string;
  lengthMmss: string;      // base screen time, MM:SS
  setupCount: number;
  shootingTime: string;    // H:MM:SS including setups
  startClock: string;      // HH:MM
  endClock: string;        // HH:MM
};

export type SummaryRow = {
  type: 'summary';
  kind: SummaryKind;
  text: string;
};

export type ScheduleRow = SceneRow | SummaryRow;
