import { vi } from "vitest";

import type { DataSources } from "../api/sources";
import type { AlertState, Notifier } from "../model/alert-model";
import type { IndexSample, SkySample } from "../model/space-weather-model";
import type { AlertStateStore } from "./alert-state-store";
import { StateLockedError, StatePersistError } from "./errors";

// In-process stand-ins for the file store, the upstream providers and Discord.

export class MemoryStateStore implements AlertStateStore {
  saves = 0;
  failSave = false;
  locked = false;

  constructor(public state: AlertState = {}) {}

  async load(): Promise<AlertState> {
    return structuredClone(this.state);
  }

  async save(state: AlertState): Promise<void> {
    if (this.failSave) throw new StatePersistError("memory://alert_state.json");
    this.state = structuredClone(state);
    this.saves++;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    if (this.locked) throw new StateLockedError("memory://alert_state.json.lock", "other-run");
    this.locked = true;
    try {
      return await fn();
    } finally {
      this.locked = false;
    }
  }
}

export type FakeData = {
  current: IndexSample;
  currentSky: SkySample;
  forecast?: IndexSample[];
  forecastSky?: SkySample[];
  nowcast?: IndexSample | null;
};

export function fakeSources(data: FakeData) {
  return {
    fetchCurrentIndex: vi.fn(async () => data.current),
    fetchForecastIndex: vi.fn(async () => data.forecast ?? []),
    fetchNowcastIndex: vi.fn(async () => data.nowcast ?? null),
    fetchCurrentSky: vi.fn(async () => data.currentSky),
    fetchForecastSky: vi.fn(async () => data.forecastSky ?? []),
  } satisfies DataSources;
}

export function fakeNotifier() {
  return { notify: vi.fn<Notifier["notify"]>(async () => {}) } satisfies Notifier;
}
