export interface QueueStats {
  capacity: number;

  avgFillDepth: number;
  maxFillDepth: number;

  totalTransferred: number;
  totalElapsedTime: number;
  avgElapsedPerItem: number;

  fullStalls: number;
  emptyStalls: number;
}

/** Raw counters a queue accumulates while it runs. */
export interface QueueCounters {
  capacity: number;
  takesCompleted: number;
  occupancySum: number;
  maxOccupancySeen: number;
  elapsedAtLastTake: number;
  fullStalls: number;
  emptyStalls: number;
}

/**
 * Turns raw counters into the shutdown summary. With no takes at all the two
 * averages are reported as 0.
 */
export function computeStats(counters: QueueCounters): QueueStats {
  const takes = counters.takesCompleted;

  return {
    capacity: counters.capacity,

    avgFillDepth: takes > 0 ? counters.occupancySum / takes : 0,
    maxFillDepth: counters.maxOccupancySeen,

    totalTransferred: takes,
    totalElapsedTime: counters.elapsedAtLastTake,
    avgElapsedPerItem: takes > 0 ? counters.elapsedAtLastTake / takes : 0,

    fullStalls: counters.fullStalls,
    emptyStalls: counters.emptyStalls,
  };
}

export function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(3);
}

export function formatTime(value: number): string {
  return `${formatNumber(value)} ns`;
}

export function formatStats(stats: QueueStats): string[] {
  return [
    `queue capacity: ${stats.capacity}`,
    `average fill depth: ${formatNumber(stats.avgFillDepth)}`,
    `average transfer time per item: ${formatTime(stats.avgElapsedPerItem)}`,
    `total items transferred: ${stats.totalTransferred}`,
    `total elapsed time: ${formatTime(stats.totalElapsedTime)}`,
  ];
}
