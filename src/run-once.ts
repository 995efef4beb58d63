import "dotenv/config";

import { loadConfig } from "./utils/config";
import { ConfigError, errorMessage } from "./utils/errors";
import { createLiveDeps, runAlertsOnce } from "./utils/run-alerts";

async function main(): Promise<void> {
  const dryRun = process.argv.includes("--dry-run");
  const config = loadConfig(process.env);
  if (!dryRun && config.discordWebhookUrl === "") {
    throw new ConfigError(["DISCORD_WEBHOOK_URL: required unless --dry-run"]);
  }

  const result = await runAlertsOnce(config, createLiveDeps(config), { dryRun, source: "cron" });
  console.log(`[cron] done at ${result.now}: sent=${result.sent}${dryRun ? " (dry run)" : ""}`);
}

main().catch((err) => {
  console.error(`FAIL: ${errorMessage(err)}`);
  process.exit(1);
});
