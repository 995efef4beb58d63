import type { WindowMatch } from "../model/alert-model";
import type { SkySample } from "../model/space-weather-model";

/**
 * First sample (ascending time) that is night with cloud cover at or below
 * `maxCloud`. The earliest qualifying hour is the one to recommend.
 */
export function findBestWindow(
  samples: SkySample[],
  maxCloud: number,
): WindowMatch | null {
  const ordered = [...samples].sort((a, b) => a.timestamp - b.timestamp);
  for (const s of ordered) {
    if (s.isNight && s.cloudFraction <= maxCloud) {
      return { timestamp: s.timestamp, isNight: true, cloudFraction: s.cloudFraction };
    }
  }
  return null;
}
