/**
 * ntfy transport — POST <server>/<topic>, message as body, metadata as headers.
 *
 * Single attempt with a timeout, no retry.
 */

import type { NotificationMessage, NotificationTransport } from "./types";

const TIMEOUT_MS = 10000;

/** The slice of fetch this transport uses. */
export type FetchLike = (
  url: string,
  init: RequestInit
) => Promise<{ ok: boolean; status: number }>;

export interface NtfyTransportOptions {
  server: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export class NtfyTransport implements NotificationTransport {
  private readonly server: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: NtfyTransportOptions) {
    this.server = options.server.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(message: NotificationMessage): Promise<void> {
    const res = await this.fetchImpl(`${this.server}/${encodeURIComponent(message.topic)}`, {
      method: "POST",
      headers: {
        Title: message.title,
        Priority: message.priority,
        Tags: message.tags.join(","),
      },
      body: message.body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status}`);
    }
  }
}
