import type { ScheduleResult, ScheduleRow, SceneRow, SummaryEntry, SummaryKind } from './scheduleTypes';
import { formatClock, formatHoursMinutes } from './time';

// Row identification relies on these prefixes; exporters match on them too.
export const SUMMARY_PREFIXES: Record<SummaryKind, string> = {
  lunch: 'LUNCH',
  total: 'TOTAL SHOOT LENGTH',
  wrap: 'ESTIMATED WRAP',
};

const KINDS: SummaryKind[] = ['lunch', 'total', 'wrap'];

export function summaryKindOf(text: string): SummaryKind | null {
  return KINDS.find(k => text.startsWith(SUMMARY_PREFIXES[k])) ?? null;
}

export function assembleSummary(schedule: ScheduleResult): SummaryEntry[] {
  const entries: SummaryEntry[] = [];

  const lunch = schedule.lunchPlacement;
  if (lunch) {
    const minutes = Math.round((lunch.endClock - lunch.startClock) / 60);
    entries.push({
      kind: 'lunch',
      position:
        lunch.afterSceneIndex === null
          ? { type: 'append' }
          : { type: 'after', sceneIndex: lunch.afterSceneIndex },
      displayText: `${SUMMARY_PREFIXES.lunch} — Starts at ${formatClock(lunch.startClock)} (${minutes} min)`,
    });
  }

  entries.push({
    kind: 'total',
    position: { type: 'append' },
    displayText: `${SUMMARY_PREFIXES.total} — ${formatHoursMinutes(schedule.totalSceneSeconds)}`,
  });
  entries.push({
    kind: 'wrap',
    position: { type: 'append' },
    displayText: `${SUMMARY_PREFIXES.wrap} — ${formatClock(schedule.wrapClock)}`,
  });

  return entries;
}

/**
 * Merge summary entries into the scene rows: "after" entries follow their
 * scene, "append" entries close the table in order.
 */
export function layoutScheduleRows(sceneRows: SceneRow[], entries: SummaryEntry[]): ScheduleRow[] {
  const rows: ScheduleRow[] = [];
  const toRow = (e: SummaryEntry): ScheduleRow => ({ type: 'summary', kind: e.kind, text: e.displayText });

  for (const row of sceneRows) {
    rows.push(row);
    for (const e of entries) {
      if (e.position.type === 'after' && e.position.sceneIndex === row.sceneIndex) rows.push(toRow(e));
    }
  }
  for (const e of entries) {
    if (e.position.type === 'append') rows.push(toRow(e));
  }
  return rows;
}
