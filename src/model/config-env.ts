export interface Env {
  DISCORD_WEBHOOK_URL?: string;
  TRIGGER_TOKEN?: string;

  LAT?: string;
  LON?: string;
  TIMEZONE?: string;
  LOCATION_NAME?: string;

  NOW_MIN_KP?: string;
  FORECAST_MIN_KP?: string;
  MAX_CLOUDCOVER?: string;

  NOW_COOLDOWN_SECONDS?: string;
  FORECAST_COOLDOWN_SECONDS?: string;
  FORECAST_WINDOW_HOURS?: string;
  PEAK_WINDOW_HOURS?: string;

  FORECAST_ENABLED?: string;
  NOWCAST_ENABLED?: string;

  STATE_FILE?: string;
  PORT?: string;
}

export type Thresholds = {
  immediateMinThreshold: number;
  forecastMinThreshold: number;
  maxCloudThreshold: number; // percent
  forecastWindowHours: number;
  peakWindowHours: number;
};

export type Location = {
  name: string;
  lat: number;
  lon: number;
  timezone: string; // IANA zone, e.g. Europe/Warsaw
};

export type AlertConfig = {
  discordWebhookUrl: string;
  triggerToken: string;
  location: Location;
  thresholds: Thresholds;
  cooldownSeconds: { IMMEDIATE: number; FORECAST: number };
  forecastEnabled: boolean;
  nowcastEnabled: boolean;
  stateFile: string;
  port: number;
};
