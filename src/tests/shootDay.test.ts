import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { DayConfigError } from '@/lib/dayConfig';
import { planShootDay, planShootDayFromFile } from '@/lib/shootDay';

const script = ['INT. OFFICE - DAY', 'He walks in. He sits down.', 'EXT. PARK - DAY', 'Children play.'].join('\n');

describe('planShootDay', () => {
  it('turns a screenplay into scene and summary rows', () => {
    const plan = planShootDay(script, { startTime: '08:00', lunchDurationMinutes: 30 });

    expect(plan.durations.map(d => d.totalSeconds)).toEqual([902, 1501]);
    expect(plan.schedule.totalSceneSeconds).toBe(2403);
    expect(plan.rows).toEqual([
      {
        type: 'scene',
        number: 1,
        sceneIndex: 0,
        heading: 'INT. OFFICE - DAY',
        actionLines: 1,
        dialogueLines: 0,
        pageLabel: '0',
        lengthMmss: '00:02',
        setupCount: 3,
        shootingTime: '0:15:02',
        startClock: '08:00',
        endClock: '08:15',
      },
      {
        type: 'scene',
        number: 2,
        sceneIndex: 1,
        heading: 'EXT. PARK - DAY',
        actionLines: 1,
        dialogueLines: 0,
        pageLabel: '0',
        lengthMmss: '00:01',
        setupCount: 5,
        shootingTime: '0:25:01',
        startClock: '08:15',
        endClock: '08:40',
      },
      { type: 'summary', kind: 'lunch', text: 'LUNCH — Starts at 08:40 (30 min)' },
      { type: 'summary', kind: 'total', text: 'TOTAL SHOOT LENGTH — 0h40m' },
      { type: 'summary', kind: 'wrap', text: 'ESTIMATED WRAP — 09:10' },
    ]);
  });

  it('applies setup overrides by scene position', () => {
    const plan = planShootDay(script, {}, { 0: 10 });
    expect(plan.durations[0].setupCount).toBe(10);
    expect(plan.durations[0].totalSeconds).toBe(2 + 10 * 5 * 60);
    expect(plan.durations[1].setupCount).toBe(5);
  });

  it('ignores overrides when default setups are locked', () => {
    const plan = planShootDay(script, { lockDefaultSetups: true }, { 0: 10 });
    expect(plan.durations[0].setupCount).toBe(3);
  });

  it('still produces summary rows for a script without scenes', () => {
    const plan = planShootDay('Notes only.', { lunchDurationMinutes: 30 });
    expect(plan.scenes).toEqual([]);
    expect(plan.warnings).toHaveLength(1);
    expect(plan.rows).toEqual([
      { type: 'summary', kind: 'lunch', text: 'LUNCH — Starts at 08:00 (30 min)' },
      { type: 'summary', kind: 'total', text: 'TOTAL SHOOT LENGTH — 0h00m' },
      { type: 'summary', kind: 'wrap', text: 'ESTIMATED WRAP — 08:30' },
    ]);
  });

  it('rejects bad configuration before touching the script', () => {
    expect(() => planShootDay(script, { startTime: 'noon' })).toThrow(DayConfigError);
  });

  it('plans straight from a file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'shoot-day-'));
    try {
      const file = join(dir, 'short.fountain');
      await writeFile(file, script, 'utf8');
      const plan = await planShootDayFromFile(file, { includeExtras: false });
      expect(plan.rows.map(r => (r.type === 'scene' ? r.heading : r.text))).toEqual([
        'INT. OFFICE - DAY',
        'EXT. PARK - DAY',
        'TOTAL SHOOT LENGTH — 0h40m',
        'ESTIMATED WRAP — 08:40',
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
