import type { IndexSample, SkySample } from "./space-weather-model";

export type AlertChannel = "IMMEDIATE" | "FORECAST";

export const ALERT_CHANNELS: readonly AlertChannel[] = ["IMMEDIATE", "FORECAST"];

export type ChannelState = {
  lastFiredAt?: number; // epoch ms
  lastNotifiedPeakAt?: number; // epoch ms, FORECAST only
};

export type AlertState = Partial<Record<AlertChannel, ChannelState>>;

export type WindowMatch = {
  timestamp: number;
  isNight: true;
  cloudFraction: number;
};

export type Verdict = {
  channel: AlertChannel;
  fires: boolean;
  indexValueOrPeak: number;
  peakTime?: number;
  witness?: WindowMatch;
  reason: string;
  suppressedBy?: "cooldown" | "dedup";
};

// Facts the notifier renders next to the verdicts.
export type AlertContext = {
  now: number;
  currentIndex: IndexSample;
  currentSky: SkySample;
  nowcast?: IndexSample | null;
  location: { name: string; lat: number; lon: number; timezone: string };
  maxCloudThreshold: number;
  forecastWindowHours: number;
  peakWindowHours: number;
};

export type RunResult = {
  ok: true;
  now: string;
  sent: number;
  dryRun: boolean;
  verdicts: Verdict[];
};

export type Notifier = {
  notify(verdicts: Verdict[], context: AlertContext): Promise<void>;
};
