import { z } from "zod";

import type { Location } from "../model/config-env";
import type { SkySample } from "../model/space-weather-model";
import { UpstreamFetchError } from "../utils/errors";
import { fetchParsed } from "./fetch-json";

const FORECAST_URL = "https://api.open-meteo.com/v1/forecast";

// With timeformat=unixtime every `time` is epoch seconds, so hours on either
// side of a DST switch need no offset arithmetic.
const CurrentResponseSchema = z.object({
  current: z.object({
    time: z.number(),
    cloud_cover: z.number().nullable(),
    is_day: z.number().nullable(),
  }),
});

const HourlyResponseSchema = z.object({
  hourly: z.object({
    time: z.array(z.number()),
    cloud_cover: z.array(z.number().nullable()),
    is_day: z.array(z.number().nullable()),
  }),
});

function baseUrl(location: Location): URL {
  const url = new URL(FORECAST_URL);
  url.searchParams.set("latitude", String(location.lat));
  url.searchParams.set("longitude", String(location.lon));
  url.searchParams.set("timezone", location.timezone);
  url.searchParams.set("timeformat", "unixtime");
  return url;
}

export function forecastDays(forecastWindowHours: number, peakWindowHours: number): number {
  return Math.min(16, Math.ceil((forecastWindowHours + peakWindowHours) / 24) + 1);
}

export async function fetchCurrentSky(location: Location): Promise<SkySample> {
  const url = baseUrl(location);
  url.searchParams.set("current", "cloud_cover,is_day");

  const { current } = await fetchParsed("open-meteo-current", url, CurrentResponseSchema);
  if (current.cloud_cover === null || current.is_day === null) {
    throw new UpstreamFetchError("open-meteo-current", "missing current cloud_cover/is_day");
  }

  return {
    timestamp: current.time * 1000,
    isNight: current.is_day === 0,
    cloudFraction: current.cloud_cover,
  };
}

export async function fetchForecastSky(
  location: Location,
  forecastWindowHours: number,
  peakWindowHours: number,
): Promise<SkySample[]> {
  const url = baseUrl(location);
  url.searchParams.set("hourly", "cloud_cover,is_day");
  url.searchParams.set("forecast_days", String(forecastDays(forecastWindowHours, peakWindowHours)));

  const { hourly } = await fetchParsed("open-meteo-hourly", url, HourlyResponseSchema);
  const { time: times, cloud_cover: clouds, is_day: isDays } = hourly;

  if (times.length !== clouds.length || times.length !== isDays.length) {
    throw new UpstreamFetchError(
      "open-meteo-hourly",
      `hourly arrays differ in length (time=${times.length}, cloud_cover=${clouds.length}, is_day=${isDays.length})`,
    );
  }

  const out: SkySample[] = [];
  times.forEach((t, i) => {
    const cloud = clouds[i];
    const isDay = isDays[i];
    // null entries mark hours beyond the model horizon
    if (cloud === null || isDay === null) return;
    out.push({ timestamp: t * 1000, isNight: isDay === 0, cloudFraction: cloud });
  });
  return out;
}
