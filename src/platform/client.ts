import type { Logger } from "pino";
import type * as z from "zod/v4";
import {
  AuthenticationError,
  CancellationError,
  ConfigurationError,
  RemoteApiError,
  RequestTimeoutError
} from "../core/errors.js";
import { decodeMetadataHeaders, encodeMetadataHeaders } from "./metadataHeaders.js";
import {
  zAnalysisListResponse,
  zAnalysisStatus,
  zAppListResponse,
  zAppParameters,
  zCreateDirectoryResponse,
  zDirectoryContents,
  zLaunchResponse,
  zLoginResponse,
  type Analysis,
  type AnalysisStatus,
  type App,
  type AppParameters,
  type BrowseOptions,
  type ControlOperation,
  type CreateDirectoryResponse,
  type DataEntry,
  type DeleteOptions,
  type LaunchResponse,
  type LaunchSubmission,
  type ListAppsQuery,
  type MetadataInput,
  type PlatformApi
} from "./types.js";

const TOKEN_EXPIRY_MARGIN_MS = 60_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface PlatformClientOptions {
  baseUrl: string;
  token?: string;
  username?: string;
  password?: string;
  logger: Logger;
  fetch?: FetchLike;
  now?: () => number;
  requestTimeoutMs?: number;
}

interface Exchange {
  status: number;
  headers: Headers;
  body: Buffer;
}

interface ExchangeInit {
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

/** Path under the data-store root; leading slashes on the caller's path are ignored. */
export function buildDataPath(path: string): string {
  const trimmed = path.replace(/^\/+/, "");
  return `/data/${trimmed.split("/").map(encodeURIComponent).join("/")}`;
}

function withQuery(path: string, query: URLSearchParams): string {
  const qs = query.toString();
  return qs ? `${path}?${qs}` : path;
}

function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new CancellationError("request canceled"));
    promise.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      }
    );
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
  });
}

export class PlatformClient implements PlatformApi {
  private readonly baseUrl: string;
  private readonly username: string | null;
  private readonly password: string | null;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private readonly requestTimeoutMs: number;

  private token: string | null;
  private tokenExpiresAt = 0;
  private pendingLogin: Promise<void> | null = null;

  constructor(opts: PlatformClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.token = opts.token ? opts.token : null;
    this.username = opts.username ? opts.username : null;
    this.password = opts.password ? opts.password : null;
    this.logger = opts.logger;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
    this.now = opts.now ?? Date.now;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  private hasCredentials(): boolean {
    return this.username !== null && this.password !== null;
  }

  async authenticate(signal?: AbortSignal): Promise<void> {
    if (!this.username || !this.password) {
      throw new ConfigurationError("username and password are required to log in");
    }
    const basic = Buffer.from(`${this.username}:${this.password}`, "utf8").toString("base64");
    const res = await this.exchange("POST", "/login", { headers: { Authorization: `Basic ${basic}` }, signal });
    if (res.status !== 200) {
      throw new AuthenticationError(res.status, res.body.toString("utf8"));
    }

    const login = this.decode(zLoginResponse, res, "POST", "/login");
    const issuedAt = this.now();
    this.token = login.access_token;
    this.tokenExpiresAt = issuedAt + login.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS;
    this.logger.info(
      { expires_in: login.expires_in, effective_expiry: new Date(this.tokenExpiresAt).toISOString() },
      "login successful"
    );
  }

  /**
   * Make sure a usable token is held before a request.
   *
   * Concurrent callers that find the token stale share one login attempt. A
   * stale static token without credentials is used as-is; the server decides.
   */
  async ensureToken(signal?: AbortSignal): Promise<void> {
    if (this.token && this.now() < this.tokenExpiresAt) return;

    if (!this.hasCredentials()) {
      if (this.token) return;
      throw new ConfigurationError("no token or credentials available");
    }
    if (signal?.aborted) throw new CancellationError("request canceled");

    if (!this.pendingLogin) {
      this.logger.debug({ username: this.username }, "token expired or missing, logging in");
      this.pendingLogin = this.authenticate().finally(() => {
        this.pendingLogin = null;
      });
    }
    await abortable(this.pendingLogin, signal);
  }

  async listApps(query: ListAppsQuery, signal?: AbortSignal): Promise<App[]> {
    const params = new URLSearchParams();
    if (query.name) params.set("name", query.name);
    if (query.integrator) params.set("integrator", query.integrator);
    if (query.description) params.set("description", query.description);
    if (query.jobType) params.set("job_type", query.jobType);
    params.set("limit", String(query.limit));
    params.set("offset", String(query.offset));

    const path = withQuery("/apps", params);
    const res = await this.request("GET", path, { signal });
    return this.decode(zAppListResponse, res, "GET", path).apps;
  }

  async getAppParameters(systemId: string, appId: string, signal?: AbortSignal): Promise<AppParameters> {
    const path = `/apps/${encodeURIComponent(systemId)}/${encodeURIComponent(appId)}/parameters`;
    const res = await this.request("GET", path, { signal });
    return this.decode(zAppParameters, res, "GET", path);
  }

  async launchApp(
    systemId: string,
    appId: string,
    submission: LaunchSubmission,
    signal?: AbortSignal
  ): Promise<LaunchResponse> {
    const path = `/app/launch/${encodeURIComponent(systemId)}/${encodeURIComponent(appId)}`;
    const res = await this.request("POST", path, {
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(submission),
      signal
    });
    return this.decode(zLaunchResponse, res, "POST", path);
  }

  async getAnalysisStatus(analysisId: string, signal?: AbortSignal): Promise<AnalysisStatus> {
    const path = `/apps/analyses/${encodeURIComponent(analysisId)}/status`;
    const res = await this.request("GET", path, { signal });
    return this.decode(zAnalysisStatus, res, "GET", path);
  }

  async listAnalyses(status?: string, signal?: AbortSignal): Promise<Analysis[]> {
    const params = new URLSearchParams();
    if (status) params.set("status", status);
    const path = withQuery("/apps/analyses/", params);
    const res = await this.request("GET", path, { signal });
    return this.decode(zAnalysisListResponse, res, "GET", path).analyses;
  }

  async controlAnalysis(
    analysisId: string,
    operation: ControlOperation,
    saveOutputs?: boolean,
    signal?: AbortSignal
  ): Promise<void> {
    const params = new URLSearchParams({ operation });
    if (saveOutputs !== undefined) params.set("save_outputs", String(saveOutputs));
    const path = withQuery(`/apps/analyses/${encodeURIComponent(analysisId)}/control`, params);
    await this.request("POST", path, { signal });
  }

  async browseData(path: string, options: BrowseOptions = {}, signal?: AbortSignal): Promise<DataEntry> {
    const params = new URLSearchParams();
    if (options.offset && options.offset > 0) params.set("offset", String(options.offset));
    if (options.limit && options.limit > 0) params.set("limit", String(options.limit));
    if (options.includeMetadata) params.set("include_metadata", "true");

    const fullPath = withQuery(buildDataPath(path), params);
    const res = await this.request("GET", fullPath, { signal });
    const metadata = options.includeMetadata ? decodeMetadataHeaders(res.headers) : {};
    const contentType = res.headers.get("content-type") ?? "";

    if (contentType.includes("application/json")) {
      const dir = this.decode(zDirectoryContents, res, "GET", fullPath);
      return { kind: "directory", path: dir.path, type: dir.type, contents: dir.contents, metadata };
    }

    return { kind: "file", path, contentType, content: res.body, metadata };
  }

  async createDirectory(path: string, metadata?: MetadataInput, signal?: AbortSignal): Promise<CreateDirectoryResponse> {
    const fullPath = withQuery(buildDataPath(path), new URLSearchParams({ resource_type: "directory" }));
    const res = await this.request("PUT", fullPath, { headers: encodeMetadataHeaders(metadata), signal });
    return this.decode(zCreateDirectoryResponse, res, "PUT", fullPath);
  }

  async uploadFile(path: string, content: string, metadata?: MetadataInput, signal?: AbortSignal): Promise<void> {
    await this.request("PUT", buildDataPath(path), {
      headers: { "Content-Type": "application/octet-stream", ...encodeMetadataHeaders(metadata) },
      body: content,
      signal
    });
  }

  async setMetadata(path: string, metadata: MetadataInput, replace: boolean, signal?: AbortSignal): Promise<void> {
    const params = new URLSearchParams();
    if (replace) params.set("replace_metadata", "true");
    const fullPath = withQuery(buildDataPath(path), params);
    await this.request("PUT", fullPath, { headers: encodeMetadataHeaders(metadata), signal });
  }

  async deleteData(path: string, options: DeleteOptions = {}, signal?: AbortSignal): Promise<void> {
    const params = new URLSearchParams();
    if (options.recurse) params.set("recurse", "true");
    if (options.dryRun) params.set("dry_run", "true");
    await this.request("DELETE", withQuery(buildDataPath(path), params), { signal });
  }

  private async request(method: string, path: string, init: ExchangeInit): Promise<Exchange> {
    await this.ensureToken(init.signal);

    const headers: Record<string, string> = { ...init.headers };
    if (this.token) headers["Authorization"] = `Bearer ${this.token}`;

    const res = await this.exchange(method, path, { ...init, headers });
    if (res.status >= 400) {
      throw new RemoteApiError(method, path, res.status, res.body.toString("utf8"));
    }
    return res;
  }

  private async exchange(method: string, path: string, init: ExchangeInit): Promise<Exchange> {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    const signal = init.signal ? AbortSignal.any([init.signal, timeout]) : timeout;
    const startedAt = performance.now();

    try {
      const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: init.headers,
        body: init.body,
        signal
      });
      const body = Buffer.from(await res.arrayBuffer());
      const durationMs = Math.round(performance.now() - startedAt);
      this.logger.debug({ method, path, status: res.status, duration_ms: durationMs }, "api_call");
      return { status: res.status, headers: res.headers, body };
    } catch (err) {
      if (init.signal?.aborted) throw new CancellationError(`${method} ${path} canceled`);
      if (timeout.aborted) throw new RequestTimeoutError(method, path, this.requestTimeoutMs);
      throw err;
    }
  }

  private decode<T>(schema: z.ZodType<T>, res: Exchange, method: string, path: string): T {
    let raw: unknown;
    try {
      raw = JSON.parse(res.body.toString("utf8"));
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new RemoteApiError(method, path, res.status, `malformed response: ${reason}`);
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new RemoteApiError(method, path, res.status, `malformed response: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
