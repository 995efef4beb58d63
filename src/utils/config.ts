import { z } from "zod";

import type { AlertConfig, Env } from "../model/config-env";
import { ConfigError } from "./errors";

function num(def: number, schema: z.ZodNumber = z.number()) {
  return z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? def : Number(v.trim())))
    .pipe(schema.finite());
}

function flag(def: boolean) {
  return z
    .string()
    .optional()
    .transform((v) => {
      if (v === undefined || v.trim() === "") return def;
      return ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());
    });
}

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const EnvSchema = z.object({
  DISCORD_WEBHOOK_URL: z.string().trim().default(""),
  TRIGGER_TOKEN: z.string().trim().default(""),

  LAT: num(50.77, z.number().min(-90).max(90)),
  LON: num(16.28, z.number().min(-180).max(180)),
  TIMEZONE: z
    .string()
    .trim()
    .default("Europe/Warsaw")
    .refine(isTimeZone, { message: "unknown IANA time zone" }),
  LOCATION_NAME: z.string().trim().default("Wałbrzych"),

  NOW_MIN_KP: num(6.0, z.number().min(0)),
  FORECAST_MIN_KP: num(6.0, z.number().min(0)),
  MAX_CLOUDCOVER: num(70, z.number().min(0).max(100)),

  NOW_COOLDOWN_SECONDS: num(7200, z.number().int().min(0)),
  FORECAST_COOLDOWN_SECONDS: num(21600, z.number().int().min(0)),
  FORECAST_WINDOW_HOURS: num(24, z.number().positive()),
  PEAK_WINDOW_HOURS: num(2, z.number().min(0)),

  FORECAST_ENABLED: flag(true),
  NOWCAST_ENABLED: flag(false),

  STATE_FILE: z.string().trim().min(1).default("alert_state.json"),
  PORT: num(8787, z.number().int().min(1).max(65535)),
});

export function loadConfig(env: Env): AlertConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const e = parsed.data;

  return {
    discordWebhookUrl: e.DISCORD_WEBHOOK_URL,
    triggerToken: e.TRIGGER_TOKEN,
    location: {
      name: e.LOCATION_NAME,
      lat: e.LAT,
      lon: e.LON,
      timezone: e.TIMEZONE,
    },
    thresholds: {
      immediateMinThreshold: e.NOW_MIN_KP,
      forecastMinThreshold: e.FORECAST_MIN_KP,
      maxCloudThreshold: e.MAX_CLOUDCOVER,
      forecastWindowHours: e.FORECAST_WINDOW_HOURS,
      peakWindowHours: e.PEAK_WINDOW_HOURS,
    },
    cooldownSeconds: {
      IMMEDIATE: e.NOW_COOLDOWN_SECONDS,
      FORECAST: e.FORECAST_COOLDOWN_SECONDS,
    },
    forecastEnabled: e.FORECAST_ENABLED,
    nowcastEnabled: e.NOWCAST_ENABLED,
    stateFile: e.STATE_FILE,
    port: e.PORT,
  };
}
