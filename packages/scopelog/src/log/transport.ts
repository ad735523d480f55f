import type { LogPayload } from "@/log/event";

/**
 * Delivers one structured record to a remote endpoint. Rejects on any
 * failure; the dispatcher decides what to do with it.
 */
export interface RemoteTransport {
  send(url: string, payload: LogPayload, timeoutMs: number): Promise<void>;
}

/**
 * POSTs the payload as JSON with `fetch`. No authentication, no retry.
 */
export class FetchTransport implements RemoteTransport {
  async send(url: string, payload: LogPayload, timeoutMs: number) {
    const res = await globalThis.fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(timeoutMs),
    });
    // the body is never read; release the connection
    await res.body?.cancel();

    if (!res.ok) {
      throw new Error(`POST ${url} failed: ${res.status}`);
    }
  }
}
