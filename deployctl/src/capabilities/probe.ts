import axios, { type AxiosInstance } from "axios";

export type ProbeResult = {
  url: string;
  ok: boolean;
  /** HTTP status, or null when no response arrived. */
  status: number | null;
  duration_ms: number;
  error?: string;
};

/** Single read-only HTTP check against the deployed service. */
export interface Probe {
  check(url: string, signal?: AbortSignal): Promise<ProbeResult>;
}

/**
 * GET with `curl -f` semantics: any status below 400 passes, redirects are
 * not followed, connection errors and timeouts fail.
 */
export class HttpProbe implements Probe {
  private readonly client: AxiosInstance;

  constructor(timeoutMs: number, client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        timeout: timeoutMs,
        maxRedirects: 0,
        validateStatus: () => true,
        headers: { "User-Agent": "deployctl-verify/0.1" },
      });
  }

  async check(url: string, signal?: AbortSignal): Promise<ProbeResult> {
    const start = Date.now();
    try {
      const response = await this.client.get(url, { signal, responseType: "text" });
      const ok = response.status < 400;
      return {
        url,
        ok,
        status: response.status,
        duration_ms: Date.now() - start,
        ...(ok ? {} : { error: `HTTP ${response.status}` }),
      };
    } catch (error) {
      if (signal?.aborted) throw error;
      const message = axios.isAxiosError(error)
        ? `${error.code ?? "NETWORK_ERROR"}: ${error.message}`
        : error instanceof Error
          ? error.message
          : String(error);
      return { url, ok: false, status: null, duration_ms: Date.now() - start, error: message };
    }
  }
}
