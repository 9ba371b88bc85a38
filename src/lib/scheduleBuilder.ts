import type { DayConfig, LunchPlacement, ScheduleResult, SceneTime } from './scheduleTypes';

export type ScheduleConfig = Omit<DayConfig, 'wordsPerPage' | 'setupMinutes' | 'lockDefaultSetups'>;

/**
 * Where lunch lands: after the first scene whose cumulative time reaches the
 * target. When no scene gets there, lunch follows the last scene; auto mode
 * starts it when the scenes end, fixed mode keeps the requested clock time.
 */
function placeLunch(durations: number[], totalSceneSeconds: number, config: ScheduleConfig): LunchPlacement {
  const target =
    config.lunchMode === 'auto'
      ? Math.floor(totalSceneSeconds / 2)
      : config.fixedLunchHours * 3600;

  let afterSceneIndex: number | null = null;
  let startClock = config.startTime + totalSceneSeconds;
  let found = false;

  let running = 0;
  for (let i = 0; i < durations.length; i++) {
    running += durations[i];
    if (running >= target) {
      afterSceneIndex = i;
      startClock = config.startTime + running;
      found = true;
      break;
    }
  }

  if (!found) {
    afterSceneIndex = durations.length > 0 ? durations.length - 1 : null;
    if (config.lunchMode === 'fixed') startClock = config.startTime + target;
  }

  return {
    afterSceneIndex,
    startClock,
    endClock: startClock + config.lunchDurationMinutes * 60,
  };
}

export function buildSchedule(durations: number[], config: ScheduleConfig): ScheduleResult {
  const sceneTimes: SceneTime[] = [];
  let clock = config.startTime;
  durations.forEach((secs, sceneIndex) => {
    const startClock = clock;
    clock += secs;
    sceneTimes.push({ sceneIndex, startClock, endClock: clock });
  });

  const totalSceneSeconds = clock - config.startTime;
  let totalDaySeconds = totalSceneSeconds;
  let lunchPlacement: LunchPlacement | null = null;

  if (config.includeExtras) {
    lunchPlacement = placeLunch(durations, totalSceneSeconds, config);
    totalDaySeconds += config.lunchDurationMinutes * 60 + config.moveCount * config.moveDurationMinutes * 60;
  }

  return {
    sceneTimes,
    totalSceneSeconds,
    lunchPlacement,
    totalDaySeconds,
    wrapClock: config.startTime + totalDaySeconds,
  };
}
