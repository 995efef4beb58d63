import type { AlertContext, Verdict } from "../model/alert-model";

export function kpLabel(kp: number): string {
  if (kp >= 8) return "EXTREME";
  if (kp >= 7) return "VERY HIGH";
  if (kp >= 6) return "HIGH";
  if (kp >= 5) return "MODERATE";
  return "LOW";
}

/** "19.10.2026, 21:00" in the given IANA zone. */
export function formatLocal(ts: number, timezone: string): string {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(new Date(ts));
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "??";
  return `${get("day")}.${get("month")}.${get("year")}, ${get("hour")}:${get("minute")}`;
}

/** "2026-10-19 19:00" */
export function formatUtc(ts: number): string {
  return new Date(ts).toISOString().slice(0, 16).replace("T", " ");
}

/** "5h 12m ago"; null for readings stamped after `now`. */
export function formatAge(ts: number, now: number): string | null {
  const minutes = Math.floor((now - ts) / 60_000);
  if (minutes < 0) return null;
  const h = Math.floor(minutes / 60);
  return h > 0 ? `${h}h ${minutes % 60}m ago` : `${minutes}m ago`;
}

function withAge(ts: number, now: number): string {
  const age = formatAge(ts, now);
  return age === null ? "" : `, ${age}`;
}

function mark(ok: boolean): string {
  return ok ? "✅" : "❌";
}

export function pickPriority(verdicts: Verdict[], ctx: AlertContext): string {
  const nowGateOk = ctx.currentSky.isNight && ctx.currentSky.cloudFraction <= ctx.maxCloudThreshold;
  const immediate = verdicts.some((v) => v.channel === "IMMEDIATE" && v.fires);
  const forecast = verdicts.some((v) => v.channel === "FORECAST" && v.fires);

  if (ctx.nowcast && ctx.nowcast.value >= 7 && nowGateOk) return "🟢";
  if (immediate && nowGateOk) return "🟢";
  if (!immediate && forecast) return "🟡";
  return "🔴";
}

export function buildAlertMessage(verdicts: Verdict[], ctx: AlertContext): string {
  const tz = ctx.location.timezone;
  const immediate = verdicts.find((v) => v.channel === "IMMEDIATE" && v.fires);
  const forecast = verdicts.find((v) => v.channel === "FORECAST" && v.fires);
  const priority = pickPriority(verdicts, ctx);

  const headline: string[] = [];
  if (immediate) headline.push(`NOW Kp${immediate.indexValueOrPeak.toFixed(1)}`);
  if (forecast) headline.push(`Forecast Kp${forecast.indexValueOrPeak.toFixed(1)}`);

  const kp = ctx.currentIndex.value;
  const sky = ctx.currentSky;
  const lines: string[] = [
    `${priority} Aurora alert — ${ctx.location.name}: ${headline.join(" · ") || "no channel firing"}`,
    `📍 ${ctx.location.name} (${ctx.location.lat.toFixed(2)} N, ${ctx.location.lon.toFixed(2)} E)`,
    "",
    "⚡ NOW",
    `- Kp: ${kp.toFixed(1)} (${kpLabel(kp)}), measured ${formatLocal(ctx.currentIndex.timestamp, tz)} (UTC ${formatUtc(ctx.currentIndex.timestamp)})${withAge(ctx.currentIndex.timestamp, ctx.now)}`,
  ];

  if (ctx.nowcast) {
    lines.push(
      `- Nowcast (1-min estimate): ${ctx.nowcast.value.toFixed(1)} (${kpLabel(ctx.nowcast.value)}), ${formatLocal(ctx.nowcast.timestamp, tz)}${withAge(ctx.nowcast.timestamp, ctx.now)}`,
    );
  }

  lines.push(
    `- Sky: ${sky.isNight ? "NIGHT" : "DAY"} ${mark(sky.isNight)}, clouds ${sky.cloudFraction}% ${mark(sky.cloudFraction <= ctx.maxCloudThreshold)}`,
  );

  if (forecast && forecast.peakTime !== undefined) {
    const peak = forecast.indexValueOrPeak;
    lines.push(
      "",
      `🔮 FORECAST (${ctx.forecastWindowHours}h)`,
      `- Peak Kp: ${peak.toFixed(1)} (${kpLabel(peak)}) at ${formatLocal(forecast.peakTime, tz)} (UTC ${formatUtc(forecast.peakTime)})`,
    );
    if (forecast.witness) {
      lines.push(
        `- Best window (±${ctx.peakWindowHours}h): ${formatLocal(forecast.witness.timestamp, tz)}, clouds ${forecast.witness.cloudFraction}% ✅`,
      );
    }
  }

  const rec: string[] = [];
  if (immediate) rec.push("Go out now: conditions are favourable.");
  if (forecast?.witness) {
    rec.push(`Best window: ${formatLocal(forecast.witness.timestamp, tz)} (clouds ${forecast.witness.cloudFraction}%).`);
  }
  if (rec.length === 0) rec.push("Check the northern sky away from city lights.");

  lines.push("", `✨ ${rec.join(" ")}`, "", "Sources: NOAA SWPC (Kp), Open-Meteo (night/clouds).");
  return lines.join("\n");
}
