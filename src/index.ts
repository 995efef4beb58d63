import { Hono } from "hono";

import type { AlertConfig } from "./model/config-env";
import { errorMessage } from "./utils/errors";
import { runAlertsOnce, type RunDeps } from "./utils/run-alerts";
import { sendDiscord } from "./utils/send-discord";

export function createApp(config: AlertConfig, deps: RunDeps) {
  const app = new Hono();

  const authorized = (token: string | undefined) =>
    config.triggerToken !== "" && token === config.triggerToken;

  app.get("/health", (c) => c.json({ ok: true }));

  app.get("/test-discord", async (c) => {
    if (!authorized(c.req.header("x-trigger-token"))) {
      return c.text("Unauthorized", 401);
    }
    await sendDiscord(config.discordWebhookUrl, {
      content: "✅ Discord webhook works! (aurora-alert)",
    });
    return c.text("OK");
  });

  app.post("/trigger-alerts", async (c) => {
    if (!authorized(c.req.header("x-trigger-token"))) {
      return c.text("Unauthorized", 401);
    }

    // optional body: { dryRun?: boolean }
    const body: unknown = await c.req.json().catch(() => ({}));
    const dryRun =
      typeof body === "object" && body !== null && "dryRun" in body && body.dryRun === true;

    const result = await runAlertsOnce(config, deps, { dryRun, source: "trigger" });
    return c.json(result);
  });

  app.onError((err, c) => {
    console.error(`[trigger] ${c.req.method} ${c.req.path} failed`, err);
    return c.json({ ok: false, error: errorMessage(err) }, 500);
  });

  return app;
}
