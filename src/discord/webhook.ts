/**
 * @module discord-log-sink
 * @description One-shot webhook POST (uses `fetch`). No retries.
 */

import { WebhookDeliveryError } from "../core/errors.js";
import type { WebhookPayload } from "./types.js";

export const DEFAULT_USER_AGENT = "Mozilla/5.0";

export interface PostWebhookOptions {
  /** Fetch implementation (default: global `fetch`) */
  fetch?: typeof fetch;
  /** User-Agent header (default: `Mozilla/5.0`) */
  userAgent?: string;
}

/**
 * POST `payload` as JSON to `url`. Resolves once the response arrives;
 * rejects with `WebhookDeliveryError` on a non-2xx status, or with the
 * transport error if the request never completes.
 */
export async function postWebhook(
  url: string,
  payload: WebhookPayload,
  options: PostWebhookOptions = {},
): Promise<void> {
  const fetchFn = options.fetch ?? fetch;

  const response = await fetchFn(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
    },
    body: JSON.stringify(payload),
  });

  // Release the connection; the body is never read.
  await response.body?.cancel();

  if (!response.ok) {
    throw new WebhookDeliveryError(response.status, response.statusText);
  }
}
