import type { DayConfig, PageCount, Scene, SceneDuration, SceneSetting } from './scheduleTypes';

export const SECONDS_PER_PAGE = 60;
export const MIN_SETUPS = 1;
export const MAX_SETUPS = 20;

const DEFAULT_SETUPS: Record<SceneSetting, number> = {
  interior: 3,
  exterior: 5,
};

// Maximal runs of letters, digits and underscores; combining marks split words
const WORD_RE = /[\p{L}\p{N}_]+/gu;

/** Round to nearest, ties to the even neighbour (2.5 → 2, 3.5 → 4). */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function countWords(bodyLines: string[]): number {
  return bodyLines.join(' ').match(WORD_RE)?.length ?? 0;
}

function pagesForWords(wordCount: number, wordsPerPage: number): number {
  return wordsPerPage > 0 ? wordCount / wordsPerPage : 0;
}

/** Fractional page length; 0 when wordsPerPage is not positive. */
export function estimatePages(bodyLines: string[], wordsPerPage: number): number {
  return pagesForWords(countWords(bodyLines), wordsPerPage);
}

/** Whole pages plus eighths, carrying 8/8 into the next page. */
export function toPageCount(pages: number): PageCount {
  let fullPages = Math.floor(pages);
  let eighths = roundHalfEven((pages - fullPages) * 8);
  if (eighths === 8) {
    fullPages += 1;
    eighths = 0;
  }
  return { fullPages, eighths };
}

export function formatPageCount({ fullPages, eighths }: PageCount): string {
  if (eighths === 0) return `${fullPages}`;
  if (fullPages === 0) return `${eighths}/8`;
  return `${fullPages} ${eighths}/8`;
}

export function shootSeconds(
  pages: number,
  setupCount: number,
  setupMinutes: number
): { baseSeconds: number; totalSeconds: number } {
  const baseSeconds = roundHalfEven(pages * SECONDS_PER_PAGE);
  return { baseSeconds, totalSeconds: baseSeconds + setupCount * setupMinutes * 60 };
}

export function defaultSetupCount(setting: SceneSetting): number {
  return DEFAULT_SETUPS[setting];
}

export function clampSetupCount(n: number): number {
  if (!isFinite(n)) return MIN_SETUPS;
  return Math.min(MAX_SETUPS, Math.max(MIN_SETUPS, Math.round(n)));
}

export type DurationConfig = Pick<DayConfig, 'wordsPerPage' | 'setupMinutes' | 'lockDefaultSetups'>;

/**
 * Page length and shooting time for one scene. A setup override is honoured
 * unless default setups are locked.
 */
export function estimateSceneDuration(
  scene: Scene,
  config: DurationConfig,
  setupOverride?: number
): SceneDuration {
  const wordCount = countWords(scene.bodyLines);
  const pages = pagesForWords(wordCount, config.wordsPerPage);
  const pageCount = toPageCount(pages);
  const setupCount =
    setupOverride === undefined || config.lockDefaultSetups
      ? defaultSetupCount(scene.setting)
      : clampSetupCount(setupOverride);
  const { baseSeconds, totalSeconds } = shootSeconds(pages, setupCount, config.setupMinutes);

  return {
    wordCount,
    pages,
    pageCount,
    pageLabel: formatPageCount(pageCount),
    baseSeconds,
    setupCount,
    totalSeconds,
  };
}
