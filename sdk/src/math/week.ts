export const DAY = 86_400n;
export const WEEK = 7n * DAY;

export function floorToWeek(timestamp: bigint): bigint {
  if (timestamp < 0n) throw new Error('floorToWeek: timestamp must be >= 0');
  return (timestamp / WEEK) * WEEK;
}

export class WeekClock {
  public readonly week_length: bigint;

  constructor(week_length: bigint = WEEK) {
    if (week_length <= 0n) throw new Error('WeekClock: week_length must be > 0');
    this.week_length = week_length;
  }

  weekAt(timestamp_sec: bigint): bigint {
    if (timestamp_sec <= 0n) return 0n;
    return timestamp_sec / this.week_length;
  }

  weekStart(week: bigint): bigint {
    if (week < 0n) throw new Error('WeekClock: week must be >= 0');
    return week * this.week_length;
  }

  weekEnd(week: bigint): bigint {
    return this.weekStart(week + 1n) - 1n;
  }

  secondsUntilNextWeek(timestamp_sec: bigint): bigint {
    return this.weekStart(this.weekAt(timestamp_sec) + 1n) - timestamp_sec;
  }
}
