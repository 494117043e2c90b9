import { ExecutionError, CancelledError, abortReason, type OrchestratorError } from "../errors.js";
import type { ReleaseMetadataSource } from "../types/backends.js";
import type { UpgradeSource } from "../types/matrix.js";
import { err, ok, type Result } from "../types/result.js";

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}>;

/**
 * Resolves the published version for a channel from a JSON document shaped
 * like `{ "<chart>": { "stable": "3.3.7", "dev": "4.0.0-0.dev.git.123.h9a3e1f0" } }`.
 */
export class HttpReleaseMetadataSource implements ReleaseMetadataSource {
  private readonly url: string;
  private readonly chartName: string;
  private readonly fetchFn: FetchLike;

  constructor(opts: { url: string; chartName: string; fetch?: FetchLike }) {
    this.url = opts.url;
    this.chartName = opts.chartName;
    this.fetchFn = opts.fetch ?? fetch;
  }

  async resolveVersion(channel: UpgradeSource, signal?: AbortSignal): Promise<Result<string, OrchestratorError>> {
    const action = "fetch release metadata";
    let body: unknown;
    try {
      const res = await this.fetchFn(this.url, { signal });
      if (!res.ok) {
        return err(new ExecutionError({ action, exitCode: res.status, stderr: `GET ${this.url}: ${res.status} ${res.statusText}` }));
      }
      body = await res.json();
    } catch (e: unknown) {
      if (signal?.aborted) return err(new CancelledError(abortReason(signal)));
      return err(new ExecutionError({ action, exitCode: 1, stderr: `GET ${this.url}: ${e instanceof Error ? e.message : String(e)}` }));
    }

    const chart = member(body, this.chartName);
    const version = member(chart, channel);
    if (typeof version !== "string" || version.length === 0) {
      return err(new ExecutionError({ action, exitCode: 1, stderr: `${this.url} has no ${channel} version for ${this.chartName}` }));
    }
    return ok(version);
  }
}

function member(obj: unknown, key: string): unknown {
  if (obj === null || typeof obj !== "object" || !Object.hasOwn(obj, key)) return undefined;
  const value: unknown = Reflect.get(obj, key);
  return value;
}
