import type { SkySample } from "../model/space-weather-model";
import { NoDataError } from "./errors";

const HOUR_MS = 3600 * 1000;

export class SkySeries {
  private readonly samples: SkySample[];

  constructor(samples: SkySample[]) {
    this.samples = [...samples].sort((a, b) => a.timestamp - b.timestamp);
  }

  // Closest sample to `approx`; on a tie the earlier one wins.
  conditionsAt(approx: number): SkySample {
    let best: SkySample | null = null;
    let bestDist = Infinity;
    for (const s of this.samples) {
      const dist = Math.abs(s.timestamp - approx);
      if (dist < bestDist) {
        best = s;
        bestDist = dist;
      }
    }
    if (best === null) throw new NoDataError("sky series is empty");
    return best;
  }

  samplesInRadius(center: number, radiusHours: number): SkySample[] {
    const radiusMs = radiusHours * HOUR_MS;
    return this.samples.filter((s) => Math.abs(s.timestamp - center) <= radiusMs);
  }
}
