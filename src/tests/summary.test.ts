import { describe, it, expect } from 'vitest';
import { buildSchedule } from '@/lib/scheduleBuilder';
import type { SceneRow } from '@/lib/scheduleTypes';
import { assembleSummary, layoutScheduleRows, summaryKindOf } from '@/lib/summary';

const config = {
  startTime: 8 * 3600,
  lunchMode: 'auto' as const,
  fixedLunchHours: 6,
  lunchDurationMinutes: 60,
  includeExtras: true,
  moveCount: 0,
  moveDurationMinutes: 10,
};

function sceneRow(sceneIndex: number): SceneRow {
  return {
    type: 'scene',
    number: sceneIndex + 1,
    sceneIndex,
    heading: `INT. ROOM ${sceneIndex + 1} - DAY`,
    actionLines: 0,
    dialogueLines: 0,
    pageLabel: '1',
    lengthMmss: '01:00',
    setupCount: 3,
    shootingTime: '1:00:00',
    startClock: '08:00',
    endClock: '09:00',
  };
}

describe('assembleSummary', () => {
  it('builds lunch, total and wrap entries in order', () => {
    expect(assembleSummary(buildSchedule([3600, 3600], config))).toEqual([
      { kind: 'lunch', position: { type: 'after', sceneIndex: 0 }, displayText: 'LUNCH — Starts at 09:00 (60 min)' },
      { kind: 'total', position: { type: 'append' }, displayText: 'TOTAL SHOOT LENGTH — 2h00m' },
      { kind: 'wrap', position: { type: 'append' }, displayText: 'ESTIMATED WRAP — 11:00' },
    ]);
  });

  it('omits lunch when extras are excluded', () => {
    const entries = assembleSummary(buildSchedule([3600, 3600], { ...config, includeExtras: false }));
    expect(entries.map(e => e.kind)).toEqual(['total', 'wrap']);
    expect(entries[1].displayText).toBe('ESTIMATED WRAP — 10:00');
  });

  it('appends lunch when there are no scenes', () => {
    const entries = assembleSummary(buildSchedule([], { ...config, lunchDurationMinutes: 30 }));
    expect(entries.map(e => e.displayText)).toEqual([
      'LUNCH — Starts at 08:00 (30 min)',
      'TOTAL SHOOT LENGTH — 0h00m',
      'ESTIMATED WRAP — 08:30',
    ]);
    expect(entries[0].position).toEqual({ type: 'append' });
  });

  it('shows the requested fixed lunch time after the last scene', () => {
    const schedule = buildSchedule([3600, 3600], { ...config, lunchMode: 'fixed', fixedLunchHours: 10 });
    expect(assembleSummary(schedule)[0]).toEqual({
      kind: 'lunch',
      position: { type: 'after', sceneIndex: 1 },
      displayText: 'LUNCH — Starts at 18:00 (60 min)',
    });
  });

  it('reports scene time only in the total, extras in the wrap', () => {
    const entries = assembleSummary(buildSchedule([5400], { ...config, moveCount: 2, moveDurationMinutes: 15 }));
    expect(entries[1].displayText).toBe('TOTAL SHOOT LENGTH — 1h30m');
    expect(entries[2].displayText).toBe('ESTIMATED WRAP — 11:00');
  });
});

describe('summary rows', () => {
  it('recognises summary rows by prefix', () => {
    expect(summaryKindOf('LUNCH — Starts at 13:00 (60 min)')).toBe('lunch');
    expect(summaryKindOf('TOTAL SHOOT LENGTH — 9h10m')).toBe('total');
    expect(summaryKindOf('ESTIMATED WRAP — 19:10')).toBe('wrap');
    expect(summaryKindOf('INT. LUNCHROOM - DAY')).toBeNull();
  });

  it('places lunch after its scene and closes with total and wrap', () => {
    const entries = assembleSummary(buildSchedule([3600, 3600], config));
    const rows = layoutScheduleRows([sceneRow(0), sceneRow(1)], entries);
    expect(rows.map(r => (r.type === 'scene' ? r.number : r.kind))).toEqual([1, 'lunch', 2, 'total', 'wrap']);
  });
});
