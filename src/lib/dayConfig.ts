import { z } from 'zod';
import type { DayConfig } from './scheduleTypes';
import { parseClock } from './time';

export const DEFAULT_START_TIME = '08:00';

export const DEFAULT_DAY_CONFIG: DayConfig = {
  startTime: 8 * 3600,
  wordsPerPage: 150,
  setupMinutes: 5,
  lunchMode: 'auto',
  fixedLunchHours: 6,
  lunchDurationMinutes: 60,
  includeExtras: true,
  moveCount: 0,
  moveDurationMinutes: 10,
  lockDefaultSetups: false,
};

const int = (min: number, max: number) => z.number().int().min(min).max(max);

// Ranges mirror the controls producers already use for these settings.
export const zDayConfig = z.object({
  startTime: z
    .string()
    .default(DEFAULT_START_TIME)
    .transform((text, ctx) => {
      const clock = parseClock(text);
      if (clock === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid start time "${text}" (expected HH:MM)` });
        return z.NEVER;
      }
      return clock;
    }),
  wordsPerPage: int(100, 250).default(DEFAULT_DAY_CONFIG.wordsPerPage),
  setupMinutes: int(1, 30).default(DEFAULT_DAY_CONFIG.setupMinutes),
  lunchMode: z.enum(['auto', 'fixed']).default(DEFAULT_DAY_CONFIG.lunchMode),
  fixedLunchHours: int(1, 23).default(DEFAULT_DAY_CONFIG.fixedLunchHours),
  lunchDurationMinutes: int(0, 180).default(DEFAULT_DAY_CONFIG.lunchDurationMinutes),
  includeExtras: z.boolean().default(DEFAULT_DAY_CONFIG.includeExtras),
  moveCount: int(0, 20).default(DEFAULT_DAY_CONFIG.moveCount),
  moveDurationMinutes: int(0, 120).default(DEFAULT_DAY_CONFIG.moveDurationMinutes),
  lockDefaultSetups: z.boolean().default(DEFAULT_DAY_CONFIG.lockDefaultSetups),
});

export type DayConfigInput = z.input<typeof zDayConfig>;

export class DayConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid day config: ${issues.join('; ')}`);
    this.name = 'DayConfigError';
    this.issues = issues;
  }
}

/** Fill defaults and validate. Throws DayConfigError listing every problem. */
export function resolveDayConfig(input: DayConfigInput = {}): DayConfig {
  const result = zDayConfig.safeParse(input);
  if (!result.success) {
    throw new DayConfigError(
      result.error.issues.map(issue =>
        issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  const config: DayConfig = result.data;
  return config;
}
