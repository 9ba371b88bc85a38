import { resolveDayConfig } from './dayConfig';
import type { DayConfigInput } from './dayConfig';
import { loadScreenplayFile } from './importers/file';
import { buildSchedule } from './scheduleBuilder';
import type {
  DayConfig,
  Scene,
  SceneDuration,
  SceneRow,
  ScheduleResult,
  ScheduleRow,
  SummaryEntry,
} from './scheduleTypes';
import { estimateSceneDuration } from './sceneDuration';
import { parseScreenplay } from './screenplayParser';
import { assembleSummary, layoutScheduleRows } from './summary';
import { formatClock, formatMmss, formatShootingTime } from './time';

/** Per-scene setup counts keyed by 0-based scene position. */
export type SetupOverrides = Readonly<Record<number, number>>;

export type ShootDayPlan = {
  scenes: Scene[];
  warnings: string[];
  config: DayConfig;
  durations: SceneDuration[];
  schedule: ScheduleResult;
  summary: SummaryEntry[];
  rows: ScheduleRow[];
};

/** Run estimation, scheduling and summary over already-parsed scenes. */
export function planScenes(
  scenes: Scene[],
  config: DayConfig,
  setupOverrides: SetupOverrides = {},
  warnings: string[] = []
): ShootDayPlan {
  const durations = scenes.map((scene, i) => {
    const override: number | undefined = setupOverrides[i];
    return estimateSceneDuration(scene, config, override);
  });
  const schedule = buildSchedule(durations.map(d => d.totalSeconds), config);
  const summary = assembleSummary(schedule);

  const sceneRows = scenes.map((scene, i): SceneRow => {
    const d = durations[i];
    const t = schedule.sceneTimes[i];
    return {
      type: 'scene',
      number: i + 1,
      sceneIndex: i,
      heading: scene.heading,
      actionLines: scene.actionLines,
      dialogueLines: scene.dialogueLines,
      pageLabel: d.pageLabel,
      lengthMmss: formatMmss(d.baseSeconds),
      setupCount: d.setupCount,
      shootingTime: formatShootingTime(d.totalSeconds),
      startClock: formatClock(t.startClock),
      endClock: formatClock(t.endClock),
    };
  });

  return {
    scenes,
    warnings,
    config,
    durations,
    schedule,
    summary,
    rows: layoutScheduleRows(sceneRows, summary),
  };
}

/** Screenplay text to renderable rows. Throws DayConfigError on bad config input. */
export function planShootDay(
  text: string,
  configInput: DayConfigInput = {},
  setupOverrides: SetupOverrides = {}
): ShootDayPlan {
  const config = resolveDayConfig(configInput);
  const { scenes, warnings } = parseScreenplay(text);
  return planScenes(scenes, config, setupOverrides, warnings);
}

export async function planShootDayFromFile(
  filePath: string,
  configInput: DayConfigInput = {},
  setupOverrides: SetupOverrides = {}
): Promise<ShootDayPlan> {
  const config = resolveDayConfig(configInput);
  const { scenes, warnings } = await loadScreenplayFile(filePath);
  return planScenes(scenes, config, setupOverrides, warnings);
}
