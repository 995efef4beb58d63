import { describe, expect, it } from "vitest";

import type { AlertContext, Verdict } from "../model/alert-model";
import { buildAlertMessage, formatAge, formatLocal, kpLabel, pickPriority } from "./alert-message";

const NOW = Date.UTC(2026, 9, 19, 20, 0);
const PEAK = Date.UTC(2026, 9, 20, 1, 0);

const ctx: AlertContext = {
  now: NOW,
  currentIndex: { timestamp: Date.UTC(2026, 9, 19, 18, 0), value: 6.4, kind: "observed" },
  currentSky: { timestamp: NOW, isNight: true, cloudFraction: 40 },
  nowcast: null,
  location: { name: "Test Ridge", lat: 50.77, lon: 16.28, timezone: "Europe/Warsaw" },
  maxCloudThreshold: 70,
  forecastWindowHours: 24,
  peakWindowHours: 2,
};

const immediate: Verdict = { channel: "IMMEDIATE", fires: true, indexValueOrPeak: 6.4, reason: "" };
const forecast: Verdict = {
  channel: "FORECAST",
  fires: true,
  indexValueOrPeak: 7.2,
  peakTime: PEAK,
  witness: { timestamp: PEAK, isNight: true, cloudFraction: 30 },
  reason: "",
};

describe("kpLabel", () => {
  it("maps Kp to a level", () => {
    expect(kpLabel(9)).toBe("EXTREME");
    expect(kpLabel(7)).toBe("VERY HIGH");
    expect(kpLabel(6.99)).toBe("HIGH");
    expect(kpLabel(5)).toBe("MODERATE");
    expect(kpLabel(4.99)).toBe("LOW");
  });
});

describe("formatLocal", () => {
  it("formats in the configured zone", () => {
    expect(formatLocal(NOW, "Europe/Warsaw")).toBe("19.10.2026, 22:00");
    expect(formatLocal(NOW, "UTC")).toBe("19.10.2026, 20:00");
  });
});

describe("formatAge", () => {
  it("shows hours and minutes since the reading", () => {
    expect(formatAge(NOW - (5 * 60 + 12) * 60_000 - 30_000, NOW)).toBe("5h 12m ago");
    expect(formatAge(NOW - 59 * 60_000, NOW)).toBe("59m ago");
    expect(formatAge(NOW, NOW)).toBe("0m ago");
  });

  it("has nothing to say about readings from the future", () => {
    expect(formatAge(NOW + 60_000, NOW)).toBeNull();
  });
});

describe("pickPriority", () => {
  it("is green when the immediate channel fires", () => {
    expect(pickPriority([immediate], ctx)).toBe("🟢");
  });

  it("is yellow for a forecast on its own", () => {
    expect(pickPriority([forecast], ctx)).toBe("🟡");
  });

  it("is green for a strong nowcast under a clear night sky", () => {
    const withNowcast = { ...ctx, nowcast: { timestamp: NOW, value: 7.33 } };
    expect(pickPriority([forecast], withNowcast)).toBe("🟢");
  });
});

describe("buildAlertMessage", () => {
  it("renders both channels", () => {
    expect(buildAlertMessage([immediate, forecast], ctx)).toBe(
      [
        "🟢 Aurora alert — Test Ridge: NOW Kp6.4 · Forecast Kp7.2",
        "📍 Test Ridge (50.77 N, 16.28 E)",
        "",
        "⚡ NOW",
        "- Kp: 6.4 (HIGH), measured 19.10.2026, 20:00 (UTC 2026-10-19 18:00), 2h 0m ago",
        "- Sky: NIGHT ✅, clouds 40% ✅",
        "",
        "🔮 FORECAST (24h)",
        "- Peak Kp: 7.2 (VERY HIGH) at 20.10.2026, 03:00 (UTC 2026-10-20 01:00)",
        "- Best window (±2h): 20.10.2026, 03:00, clouds 30% ✅",
        "",
        "✨ Go out now: conditions are favourable. Best window: 20.10.2026, 03:00 (clouds 30%).",
        "",
        "Sources: NOAA SWPC (Kp), Open-Meteo (night/clouds).",
      ].join("\n"),
    );
  });

  it("adds the nowcast line when available", () => {
    const text = buildAlertMessage([immediate], {
      ...ctx,
      nowcast: { timestamp: Date.UTC(2026, 9, 19, 19, 59), value: 5.67, kind: "estimated" },
    });
    expect(text.split("\n")[5]).toBe("- Nowcast (1-min estimate): 5.7 (MODERATE), 19.10.2026, 21:59, 1m ago");
  });

  it("leaves out the forecast block when only the immediate channel fires", () => {
    expect(buildAlertMessage([immediate], ctx)).not.toContain("🔮 FORECAST");
  });
});
