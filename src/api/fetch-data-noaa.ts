import type { IndexSample } from "../model/space-weather-model";
import { errorMessage, UpstreamFetchError } from "../utils/errors";
import { fetchJson } from "./fetch-json";

const SWPC_BASE = "https://services.swpc.noaa.gov";
export const KP_NOW_URL = `${SWPC_BASE}/products/noaa-planetary-k-index.json`;
export const KP_FORECAST_URL = `${SWPC_BASE}/products/noaa-planetary-k-index-forecast.json`;
export const NOWCAST_URL = `${SWPC_BASE}/json/planetary_k_index_1m.json`;

const VALUE_KEYS = ["kp", "Kp", "estimated_kp", "k_index", "kp_index", "kp_value", "value"];
const TIME_KEYS = ["time_tag", "time", "datetime", "timestamp", "date"];
const CONTAINER_KEYS = ["data", "values", "k_index", "planetary_k_index", "results"];

type RawRow = { time: unknown; value: unknown; kind?: unknown };

// NOAA time tags carry no zone and are UTC:
// "2024-05-10 12:00:00.000", "2024-05-10T12:00:00", "2024-05-10T12:00Z", ...
export function parseNoaaTime(tag: string): number | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?Z?$/.exec(
    tag.trim(),
  );
  if (!m) return null;
  const [, y, mo, d, h, mi, s, frac] = m;
  const ms = frac ? Math.round(Number(`0.${frac}`) * 1000) : 0;
  const ts = Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s ?? 0), ms);
  return Number.isFinite(ts) ? ts : null;
}

// Some feeds send values like "6P" or "7,3+"; take the leading number.
export function toKp(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v !== "string") return null;
  const m = /[-+]?(?:\d+\.?\d*|\d*\.?\d+)/.exec(v.trim().replace(",", "."));
  if (!m) return null;
  const n = Number(m[0]);
  return Number.isFinite(n) ? n : null;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function pick(rec: Record<string, unknown>, keys: string[]): unknown {
  for (const k of keys) {
    if (rec[k] !== undefined && rec[k] !== null) return rec[k];
  }
  return undefined;
}

function rowsFromTable(table: unknown[][]): RawRow[] {
  const header = table[0].map((c) => String(c));
  const timeIdx = Math.max(0, header.findIndex((c) => TIME_KEYS.includes(c)));
  const valueIdx = header.findIndex((c) => VALUE_KEYS.includes(c));
  const kindIdx = header.indexOf("observed");
  return table.slice(1).map((row) => ({
    time: row[timeIdx],
    value: row[valueIdx === -1 ? 1 : valueIdx],
    kind: kindIdx === -1 ? undefined : row[kindIdx],
  }));
}

/**
 * Normalizes the SWPC JSON shapes: a header row followed by value rows, a
 * list of objects, or an object wrapping such a list (or a single record).
 */
export function readRows(data: unknown): RawRow[] {
  if (Array.isArray(data)) {
    if (data.length === 0) return [];
    if (data.every((r): r is unknown[] => Array.isArray(r))) return rowsFromTable(data);
    return data.filter(isRecord).map((r) => ({
      time: pick(r, TIME_KEYS),
      value: pick(r, VALUE_KEYS),
      kind: r.observed,
    }));
  }
  if (isRecord(data)) {
    for (const key of CONTAINER_KEYS) {
      if (Array.isArray(data[key])) return readRows(data[key]);
    }
    return [{ time: pick(data, TIME_KEYS), value: pick(data, VALUE_KEYS) }];
  }
  return [];
}

function toKind(v: unknown): IndexSample["kind"] {
  return v === "observed" || v === "estimated" || v === "predicted" ? v : undefined;
}

export function toSamples(rows: RawRow[]): IndexSample[] {
  const out: IndexSample[] = [];
  for (const r of rows) {
    if (r.time === undefined || r.time === null) continue;
    const timestamp = parseNoaaTime(String(r.time));
    const value = toKp(r.value);
    if (timestamp === null || value === null || value < 0) continue;
    const kind = toKind(r.kind);
    out.push(kind ? { timestamp, value, kind } : { timestamp, value });
  }
  return out;
}

export async function fetchCurrentIndex(): Promise<IndexSample> {
  const data = await fetchJson("noaa-kp", new URL(KP_NOW_URL));
  const samples = toSamples(readRows(data));
  const last = samples.at(-1);
  if (!last) throw new UpstreamFetchError("noaa-kp", "no parseable Kp rows");
  return { ...last, kind: "observed" };
}

export async function fetchForecastIndex(): Promise<IndexSample[]> {
  const data = await fetchJson("noaa-kp-forecast", new URL(KP_FORECAST_URL));
  const samples = toSamples(readRows(data));
  if (samples.length === 0) {
    throw new UpstreamFetchError("noaa-kp-forecast", "no parseable forecast rows");
  }
  return samples;
}

// Best effort: the 1-minute estimate only decorates the message.
export async function fetchNowcastIndex(): Promise<IndexSample | null> {
  try {
    const data = await fetchJson("noaa-nowcast", new URL(NOWCAST_URL));
    const last = toSamples(readRows(data)).at(-1);
    return last ? { ...last, kind: "estimated" } : null;
  } catch (err) {
    console.warn(`[noaa] nowcast unavailable: ${errorMessage(err)}`);
    return null;
  }
}
