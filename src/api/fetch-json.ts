import { z } from "zod";

import { UpstreamFetchError } from "../utils/errors";

const USER_AGENT = "AuroraAlert/1.0";

export async function fetchJson(source: string, url: URL): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(url.toString(), {
      headers: {
        "user-agent": USER_AGENT,
        accept: "application/json,text/plain,*/*",
      },
      signal: AbortSignal.timeout(20_000),
    });
  } catch (err) {
    throw new UpstreamFetchError(source, `request to ${url.host} failed`, { cause: err });
  }

  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw new UpstreamFetchError(source, `HTTP ${res.status}: ${text.slice(0, 200)}`);
  }

  try {
    return (await res.json()) as unknown;
  } catch (err) {
    throw new UpstreamFetchError(source, "response is not JSON", { cause: err });
  }
}

export async function fetchParsed<S extends z.ZodTypeAny>(
  source: string,
  url: URL,
  schema: S,
): Promise<z.output<S>> {
  const parsed = schema.safeParse(await fetchJson(source, url));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`);
    throw new UpstreamFetchError(source, `unexpected response: ${issues.join("; ")}`);
  }
  return parsed.data;
}
