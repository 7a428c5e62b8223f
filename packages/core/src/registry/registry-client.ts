import { NetworkError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { packageFromPayload } from "../package/package-codec.js";
import { isRecord } from "../package/package-paths.js";
import type { ToolPackage, ToolPayload } from "../package/types.js";

const DEFAULT_TIMEOUT = 30_000;

export type RegistryClientOptions = {
  baseUrl: string;
  timeoutMs?: number;
  logger?: Logger;
};

export type AvailableTool = {
  /** `author/name/version` */
  tool: string;
  type: string;
  description: string;
};

type RequestOptions = {
  method?: "GET" | "POST";
  query?: Record<string, string>;
  body?: unknown;
};

export function normalizeBaseUrl(raw: string): string {
  return raw.trim().replace(/\/+$/, "");
}

function text(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

/** HTTP client for the tool registry service. */
export class RegistryClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: RegistryClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.logger = options.logger;
  }

  async upload(payload: ToolPayload): Promise<void> {
    await this.request("/tools/upload", { method: "POST", body: payload });
    this.logger?.info("Uploaded tool", { author: payload.author, name: payload.name, version: payload.version });
  }

  /**
   * Fetches a package. The version is only sent when pinned; a payload without
   * its own version takes the requested one.
   */
  async download(author: string, name: string, version?: string | null): Promise<ToolPackage> {
    const query: Record<string, string> = version ? { author, name, version } : { author, name };
    const body = await this.request("/tools/download", { query });
    const payload = isRecord(body) && body.version == null && version ? { ...body, version } : body;
    return packageFromPayload(payload, `${this.baseUrl}/tools/download`);
  }

  async list(): Promise<AvailableTool[]> {
    const body = await this.request("/tools/list");
    if (!Array.isArray(body)) {
      throw new NetworkError("Registry returned an invalid tool list");
    }
    return body.filter(isRecord).map((tool) => ({
      tool: `${text(tool.author, "")}/${text(tool.name, "")}/${text(tool.version, "")}`,
      type: text(tool.tool_type, "generic"),
      description: text(tool.description, ""),
    }));
  }

  async checkUpdates(author: string, name: string, currentVersion: string): Promise<boolean> {
    const body = await this.request("/tools/check_updates", {
      query: { author, name, current_version: currentVersion },
    });
    if (!isRecord(body) || typeof body.update_available !== "boolean") {
      throw new NetworkError("Registry returned an invalid update check");
    }
    return body.update_available;
  }

  private async request(apiPath: string, opts: RequestOptions = {}): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${apiPath}`);
    for (const [key, value] of Object.entries(opts.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = { Accept: "application/json" };
    const init: RequestInit = { method: opts.method ?? "GET", headers };
    if (opts.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(opts.body);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    init.signal = controller.signal;

    let res: Response;
    let raw: string;
    try {
      this.logger?.debug("Registry request", { method: init.method, url: url.toString() });
      res = await fetch(url, init);
      raw = await res.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new NetworkError(`Registry request timed out after ${this.timeoutMs}ms: ${apiPath}`, undefined, err);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new NetworkError(`Registry request failed: ${message}`, undefined, err);
    } finally {
      clearTimeout(timer);
    }

    if (!res.ok) {
      const detail = raw.trim() ? `: ${raw.trim().slice(0, 200)}` : "";
      throw new NetworkError(`Registry responded ${res.status} for ${apiPath}${detail}`, res.status);
    }
    if (!raw.trim()) return undefined;
    try {
      return JSON.parse(raw);
    } catch (err) {
      throw new NetworkError(`Registry returned invalid JSON for ${apiPath}`, res.status, err);
    }
  }
}
