export * from './lib/scheduleTypes';
export { parseScreenplay, parseScenes, isSceneHeading, settingOf, classifyBodyLines } from './lib/screenplayParser';
export {
  countWords,
  estimatePages,
  toPageCount,
  formatPageCount,
  shootSeconds,
  defaultSetupCount,
  clampSetupCount,
  estimateSceneDuration,
} from './lib/sceneDuration';
export { buildSchedule } from './lib/scheduleBuilder';
export { assembleSummary, layoutScheduleRows, summaryKindOf, SUMMARY_PREFIXES } from './lib/summary';
export { DEFAULT_DAY_CONFIG, DayConfigError, resolveDayConfig } from './lib/dayConfig';
export type { DayConfigInput } from './lib/dayConfig';
export { parseClock, formatClock, formatMmss, formatShootingTime, formatHoursMinutes } from './lib/time';
export { importFountainToScenes } from './lib/importers/fountain';
export { importFdxToScenes } from './lib/importers/fdx';
export { extractDocxText } from './lib/importers/docx';
export { loadScreenplayFile, ScreenplayImportError } from './lib/importers/file';
export { planScenes, planShootDay, planShootDayFromFile } from './lib/shootDay';
export type { SetupOverrides, ShootDayPlan } from './lib/shootDay';
