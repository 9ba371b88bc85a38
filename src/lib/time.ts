import { addSeconds, differenceInSeconds, format, isValid, parse, startOfDay } from 'date-fns';
import type { ClockSeconds } from './scheduleTypes';

// Any day without a DST change; only the time-of-day is ever read back.
const REFERENCE_DAY = new Date(2000, 0, 3);

const pad2 = (n: number) => n.toString().padStart(2, '0');

function clampSeconds(sec: number): number {
  if (!isFinite(sec) || sec < 0) return 0;
  return Math.floor(sec);
}

/** "HH:MM" → seconds since midnight, or null when the string is not a valid time of day. */
export function parseClock(text: string): ClockSeconds | null {
  const t = text.trim();
  if (!/^\d{1,2}:\d{2}$/.test(t)) return null;
  const parsed = parse(t, 'HH:mm', REFERENCE_DAY);
  if (!isValid(parsed)) return null;
  return differenceInSeconds(parsed, startOfDay(parsed));
}

/** Clock time as HH:MM, rolling over midnight. */
export function formatClock(clock: ClockSeconds): string {
  return format(addSeconds(startOfDay(REFERENCE_DAY), Math.floor(clock)), 'HH:mm');
}

/** Screen length as MM:SS (minutes keep counting past the hour). */
export function formatMmss(sec: number): string {
  const s = clampSeconds(sec);
  return `${pad2(Math.floor(s / 60))}:${pad2(s % 60)}`;
}

/** Shooting time as H:MM:SS. */
export function formatShootingTime(sec: number): string {
  const s = clampSeconds(sec);
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  return `${h}:${pad2(m)}:${pad2(s % 60)}`;
}

/** Day length as e.g. "7h05m". Seconds are dropped. */
export function formatHoursMinutes(sec: number): string {
  const s = clampSeconds(sec);
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  return `${h}h${pad2(m)}m`;
}
