import type { Verdict } from "../model/alert-model";
import type { Thresholds } from "../model/config-env";
import type { SkySample } from "../model/space-weather-model";
import { NoDataError } from "./errors";
import type { IndexSeries } from "./index-series";
import type { SkySeries } from "./sky-series";
import { findBestWindow } from "./window-search";

const HOUR_MS = 3600 * 1000;

function iso(ts: number): string {
  return new Date(ts).toISOString();
}

export function evaluateImmediate(
  index: IndexSeries,
  sky: SkySeries,
  now: number,
  t: Thresholds,
): Verdict {
  const kp = index.currentValue();
  const base = { channel: "IMMEDIATE" as const, indexValueOrPeak: kp };

  if (kp < t.immediateMinThreshold) {
    return { ...base, fires: false, reason: `Kp ${kp.toFixed(1)} below ${t.immediateMinThreshold}` };
  }

  let conditions: SkySample;
  try {
    conditions = sky.conditionsAt(now);
  } catch (err) {
    if (err instanceof NoDataError) {
      return { ...base, fires: false, reason: `no sky data: ${err.message}` };
    }
    throw err;
  }

  if (!conditions.isNight) {
    return { ...base, fires: false, reason: `Kp ${kp.toFixed(1)} met but it is daytime` };
  }
  if (conditions.cloudFraction > t.maxCloudThreshold) {
    return {
      ...base,
      fires: false,
      reason: `Kp ${kp.toFixed(1)} met but cloud cover ${conditions.cloudFraction}% > ${t.maxCloudThreshold}%`,
    };
  }

  return {
    ...base,
    fires: true,
    reason: `Kp ${kp.toFixed(1)} >= ${t.immediateMinThreshold}, night, cloud cover ${conditions.cloudFraction}%`,
  };
}

export function evaluateForecast(
  index: IndexSeries,
  skyForecast: SkySeries,
  now: number,
  t: Thresholds,
): Verdict {
  let peak: { value: number; timestamp: number };
  try {
    peak = index.maxInWindow(now, now + t.forecastWindowHours * HOUR_MS);
  } catch (err) {
    if (err instanceof NoDataError) {
      return { channel: "FORECAST", fires: false, indexValueOrPeak: 0, reason: err.message };
    }
    throw err;
  }

  const base = {
    channel: "FORECAST" as const,
    indexValueOrPeak: peak.value,
    peakTime: peak.timestamp,
  };

  if (peak.value < t.forecastMinThreshold) {
    return {
      ...base,
      fires: false,
      reason: `forecast peak Kp ${peak.value.toFixed(1)} below ${t.forecastMinThreshold}`,
    };
  }

  const candidates = skyForecast.samplesInRadius(peak.timestamp, t.peakWindowHours);
  const witness = findBestWindow(candidates, t.maxCloudThreshold);
  if (witness === null) {
    return {
      ...base,
      fires: false,
      reason: `no night with cloud cover <= ${t.maxCloudThreshold}% within ±${t.peakWindowHours}h of peak ${iso(peak.timestamp)}`,
    };
  }

  return {
    ...base,
    fires: true,
    witness,
    reason: `forecast peak Kp ${peak.value.toFixed(1)} at ${iso(peak.timestamp)}, window ${iso(witness.timestamp)} (cloud ${witness.cloudFraction}%)`,
  };
}
