import type { AlertContext, Notifier, Verdict } from "../model/alert-model";
import { buildAlertMessage } from "./alert-message";

export async function sendDiscord(webhookUrl: string, payload: unknown) {
  if (!webhookUrl || webhookUrl.trim() === "") {
    throw new Error("DISCORD_WEBHOOK_URL is missing (undefined/empty)");
  }
  const res = await fetch(webhookUrl, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(payload),
  });
  if (!res.ok) throw new Error(`Discord webhook failed: ${res.status}`);
}

export function createDiscordNotifier(webhookUrl: string): Notifier {
  return {
    async notify(verdicts: Verdict[], context: AlertContext) {
      const firing = verdicts.filter((v) => v.fires);
      if (firing.length === 0) return;
      await sendDiscord(webhookUrl, { content: buildAlertMessage(firing, context) });
    },
  };
}
