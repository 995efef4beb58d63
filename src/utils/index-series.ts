import type { IndexSample } from "../model/space-weather-model";
import { NoDataError } from "./errors";

export class IndexSeries {
  private readonly forecast: IndexSample[];

  constructor(
    private readonly current: IndexSample,
    forecast: IndexSample[],
  ) {
    // stable sort keeps provider order for equal timestamps
    this.forecast = [...forecast].sort((a, b) => a.timestamp - b.timestamp);
  }

  currentValue(): number {
    return this.current.value;
  }

  /**
   * Highest forecast value with `start <= timestamp <= end`.
   * Equal maxima resolve to the earliest timestamp.
   */
  maxInWindow(start: number, end: number): { value: number; timestamp: number } {
    let best: IndexSample | null = null;
    for (const s of this.forecast) {
      if (s.timestamp < start || s.timestamp > end) continue;
      if (best === null || s.value > best.value) best = s;
    }
    if (best === null) {
      throw new NoDataError(
        `no forecast readings between ${new Date(start).toISOString()} and ${new Date(end).toISOString()}`,
      );
    }
    return { value: best.value, timestamp: best.timestamp };
  }
}
