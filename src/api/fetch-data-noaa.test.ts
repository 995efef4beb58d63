import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { UpstreamFetchError } from "../utils/errors";
import {
  fetchCurrentIndex,
  fetchForecastIndex,
  fetchNowcastIndex,
  KP_FORECAST_URL,
  parseNoaaTime,
  readRows,
  toKp,
  toSamples,
} from "./fetch-data-noaa";

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal("fetch", mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("parseNoaaTime", () => {
  it("reads the SWPC time tag variants as UTC", () => {
    const expected = Date.UTC(2026, 9, 19, 21, 0);
    expect(parseNoaaTime("2026-10-19 21:00:00.000")).toBe(expected);
    expect(parseNoaaTime("2026-10-19 21:00:00")).toBe(expected);
    expect(parseNoaaTime("2026-10-19 21:00")).toBe(expected);
    expect(parseNoaaTime("2026-10-19T21:00:00Z")).toBe(expected);
    expect(parseNoaaTime("2026-10-19T21:00")).toBe(expected);
    expect(parseNoaaTime("2026-10-19T21:00:00.500Z")).toBe(expected + 500);
  });

  it("rejects anything else", () => {
    expect(parseNoaaTime("19.10.2026 21:00")).toBeNull();
    expect(parseNoaaTime("")).toBeNull();
  });
});

describe("toKp", () => {
  it("takes the leading number of decorated values", () => {
    expect(toKp(5.33)).toBe(5.33);
    expect(toKp("6P")).toBe(6);
    expect(toKp("7,3+")).toBe(7.3);
    expect(toKp(" 4.67 ")).toBe(4.67);
  });

  it("returns null for non-numeric input", () => {
    expect(toKp("n/a")).toBeNull();
    expect(toKp(null)).toBeNull();
    expect(toKp(Number.NaN)).toBeNull();
  });
});

describe("readRows", () => {
  it("uses the header row to locate columns", () => {
    const rows = readRows([
      ["time_tag", "kp", "observed", "noaa_scale"],
      ["2026-10-19 21:00:00", "5.33", "predicted", null],
    ]);
    expect(rows).toEqual([{ time: "2026-10-19 21:00:00", value: "5.33", kind: "predicted" }]);
  });

  it("reads lists of objects and wrapped lists", () => {
    const record = { time_tag: "2026-10-19T21:01:00", kp_index: 5, estimated_kp: 5.33, kp: "5P" };
    expect(readRows([record])).toEqual([{ time: "2026-10-19T21:01:00", value: "5P", kind: undefined }]);
    expect(readRows({ data: [record] })).toEqual(readRows([record]));
  });

  it("returns nothing for unknown shapes", () => {
    expect(readRows("oops")).toEqual([]);
    expect(readRows([])).toEqual([]);
  });
});

describe("toSamples", () => {
  it("skips rows with bad times or values", () => {
    const samples = toSamples([
      { time: "2026-10-19 21:00:00", value: "5.33", kind: "observed" },
      { time: "garbage", value: "6" },
      { time: "2026-10-20 00:00:00", value: "" },
      { time: "2026-10-20 03:00:00", value: "6.67", kind: "predicted" },
    ]);
    expect(samples).toEqual([
      { timestamp: Date.UTC(2026, 9, 19, 21), value: 5.33, kind: "observed" },
      { timestamp: Date.UTC(2026, 9, 20, 3), value: 6.67, kind: "predicted" },
    ]);
  });
});

describe("fetchCurrentIndex", () => {
  it("returns the last observed row", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse([
        ["time_tag", "Kp", "a_running", "station_count"],
        ["2026-10-19 15:00:00.000", "3.67", "22", "8"],
        ["2026-10-19 18:00:00.000", "6.33", "80", "8"],
      ]),
    );

    await expect(fetchCurrentIndex()).resolves.toEqual({
      timestamp: Date.UTC(2026, 9, 19, 18),
      value: 6.33,
      kind: "observed",
    });
  });

  it("raises UpstreamFetchError on HTTP errors", async () => {
    mockFetch.mockResolvedValueOnce(new Response("unavailable", { status: 503 }));
    await expect(fetchCurrentIndex()).rejects.toThrow("noaa-kp: HTTP 503: unavailable");
  });

  it("raises UpstreamFetchError when no row parses", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse([["time_tag", "Kp"]]));
    await expect(fetchCurrentIndex()).rejects.toThrow(UpstreamFetchError);
  });

  it("raises UpstreamFetchError on network failure", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));
    await expect(fetchCurrentIndex()).rejects.toThrow(UpstreamFetchError);
  });
});

describe("fetchForecastIndex", () => {
  it("parses every forecast row", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse([
        ["time_tag", "kp", "observed", "noaa_scale"],
        ["2026-10-19 18:00:00", "6.33", "estimated", "G2"],
        ["2026-10-19 21:00:00", "7.00", "predicted", "G3"],
      ]),
    );

    const samples = await fetchForecastIndex();
    expect(samples).toEqual([
      { timestamp: Date.UTC(2026, 9, 19, 18), value: 6.33, kind: "estimated" },
      { timestamp: Date.UTC(2026, 9, 19, 21), value: 7, kind: "predicted" },
    ]);
    expect(mockFetch.mock.calls[0][0]).toBe(KP_FORECAST_URL);
  });
});

describe("fetchNowcastIndex", () => {
  it("returns the latest estimate", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse([
        { time_tag: "2026-10-19T21:00:00", kp_index: 6, estimated_kp: 6.33, kp: "6P" },
        { time_tag: "2026-10-19T21:01:00", kp_index: 7, estimated_kp: 6.67, kp: "7M" },
      ]),
    );
    await expect(fetchNowcastIndex()).resolves.toEqual({
      timestamp: Date.UTC(2026, 9, 19, 21, 1),
      value: 7,
      kind: "estimated",
    });
  });

  it("returns null instead of failing", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    mockFetch.mockResolvedValueOnce(new Response("bad gateway", { status: 502 }));
    await expect(fetchNowcastIndex()).resolves.toBeNull();
  });
});
