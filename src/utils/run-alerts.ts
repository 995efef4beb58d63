import { createLiveSources, type DataSources } from "../api/sources";
import type {
  AlertContext,
  AlertState,
  Notifier,
  RunResult,
  Verdict,
} from "../model/alert-model";
import type { AlertConfig } from "../model/config-env";
import type { IndexSample, SkySample } from "../model/space-weather-model";
import {
  type AlertStateStore,
  applyStateGates,
  commitFiring,
  FileAlertStateStore,
} from "./alert-state-store";
import { evaluateForecast, evaluateImmediate } from "./evaluate-conditions";
import { IndexSeries } from "./index-series";
import { createDiscordNotifier } from "./send-discord";
import { SkySeries } from "./sky-series";

export type RunDeps = {
  sources: DataSources;
  store: AlertStateStore;
  notifier: Notifier;
  now?: () => number;
};

export type RunOptions = {
  dryRun?: boolean;
  source?: "cron" | "trigger";
};

export function createLiveDeps(config: AlertConfig): RunDeps {
  return {
    sources: createLiveSources(config),
    store: new FileAlertStateStore(config.stateFile),
    notifier: createDiscordNotifier(config.discordWebhookUrl),
  };
}

/**
 * One evaluate-and-exit cycle. State is read, gated and written under the
 * store lock so overlapping invocations cannot both pass a cooldown on the
 * same stale record. Verdicts reach the notifier only after their commit
 * has been persisted.
 */
export async function runAlertsOnce(
  config: AlertConfig,
  deps: RunDeps,
  opts?: RunOptions,
): Promise<RunResult> {
  const tag = `[${opts?.source ?? "cron"}]`;
  const dryRun = Boolean(opts?.dryRun);
  const now = (deps.now ?? Date.now)();
  const { sources, store, notifier } = deps;
  const t = config.thresholds;

  const { verdicts, context } = await store.withLock(async () => {
    const state = await store.load();

    const currentIndex: IndexSample = await sources.fetchCurrentIndex();
    const currentSky: SkySample = await sources.fetchCurrentSky();
    const forecastIndex = config.forecastEnabled ? await sources.fetchForecastIndex() : [];
    const forecastSky = config.forecastEnabled ? await sources.fetchForecastSky() : [];
    const nowcast = config.nowcastEnabled ? await sources.fetchNowcastIndex() : null;

    const index = new IndexSeries(currentIndex, forecastIndex);
    const candidates: Verdict[] = [evaluateImmediate(index, new SkySeries([currentSky]), now, t)];
    if (config.forecastEnabled) {
      candidates.push(evaluateForecast(index, new SkySeries(forecastSky), now, t));
    }

    let next: AlertState = state;
    const gated = candidates.map((candidate) => {
      const v = applyStateGates(
        candidate,
        state[candidate.channel],
        now,
        config.cooldownSeconds[candidate.channel],
      );
      if (v.fires) next = commitFiring(next, v, now);
      console.log(`${tag} ${v.channel} ${v.fires ? "FIRES" : "quiet"}: ${v.reason}`);
      return v;
    });

    if (next !== state && !dryRun) await store.save(next);

    const ctx: AlertContext = {
      now,
      currentIndex,
      currentSky,
      nowcast,
      location: config.location,
      maxCloudThreshold: t.maxCloudThreshold,
      forecastWindowHours: t.forecastWindowHours,
      peakWindowHours: t.peakWindowHours,
    };
    return { verdicts: gated, context: ctx };
  });

  const firing = verdicts.filter((v) => v.fires);
  if (firing.length > 0 && !dryRun) {
    await notifier.notify(firing, context);
    console.log(`${tag} notified: ${firing.map((v) => v.channel).join(", ")}`);
  } else if (firing.length === 0) {
    console.log(`${tag} no new alerts to send`);
  }

  return {
    ok: true,
    now: new Date(now).toISOString(),
    sent: dryRun ? 0 : firing.length,
    dryRun,
    verdicts,
  };
}
