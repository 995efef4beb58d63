import type { AlertConfig } from "../model/config-env";
import type { IndexSample, SkySample } from "../model/space-weather-model";
import { fetchCurrentIndex, fetchForecastIndex, fetchNowcastIndex } from "./fetch-data-noaa";
import { fetchCurrentSky, fetchForecastSky } from "./fetch-data-openmeteo";

export type DataSources = {
  fetchCurrentIndex(): Promise<IndexSample>;
  fetchForecastIndex(): Promise<IndexSample[]>;
  fetchNowcastIndex(): Promise<IndexSample | null>;
  fetchCurrentSky(): Promise<SkySample>;
  fetchForecastSky(): Promise<SkySample[]>;
};

export function createLiveSources(config: AlertConfig): DataSources {
  const { location, thresholds } = config;
  return {
    fetchCurrentIndex,
    fetchForecastIndex,
    fetchNowcastIndex,
    fetchCurrentSky: () => fetchCurrentSky(location),
    fetchForecastSky: () =>
      fetchForecastSky(location, thresholds.forecastWindowHours, thresholds.peakWindowHours),
  };
}
