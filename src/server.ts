import "dotenv/config";

import { serve } from "@hono/node-server";

import { createApp } from "./index";
import { loadConfig } from "./utils/config";
import { createLiveDeps } from "./utils/run-alerts";

const config = loadConfig(process.env);
const app = createApp(config, createLiveDeps(config));

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`[server] listening on :${info.port}`);
});
