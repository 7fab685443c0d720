import { z } from "zod";
import { parseRepositoryId } from "@runnerctl/shared/lib/identifiers";
import { RemoteApiError, ValidationError, type RemoteApiErrorCategory } from "../errors.js";
import { isAbortError, throwIfAborted } from "../runtime/abort.js";
import { DEFAULT_GITHUB_API_URL, DEFAULT_REQUEST_TIMEOUT_MS } from "../config/defaults.js";

const GITHUB_API_VERSION = "2022-11-28";
const RUNNERS_PAGE_SIZE = 100;
const MAX_RUNNER_PAGES = 50;

export type RemoteRunner = {
  id: number;
  name: string;
  status: "online" | "offline";
  busy: boolean;
  labels: string[];
};

export type ShortLivedToken = { token: string; expiresAt: string | null };

export type ReachabilityResult =
  | { ok: true; status: number; latencyMs: number }
  | { ok: false; detail: string };

export type RequestOptions = { signal?: AbortSignal; timeoutMs?: number };

/**
 * The slice of the GitHub Actions API the lifecycle and health code depend on.
 */
export interface DispatchClient {
  createRegistrationToken(repository: string, token: string, opts?: RequestOptions): Promise<ShortLivedToken>;
  listRunners(repository: string, token: string, opts?: RequestOptions): Promise<RemoteRunner[]>;
  // Resolves false when the runner was already gone.
  deleteRunner(repository: string, token: string, runnerId: number, opts?: RequestOptions): Promise<boolean>;
  checkReachability(opts?: RequestOptions): Promise<ReachabilityResult>;
}

const ShortLivedTokenSchema = z.object({
  token: z.string().min(1),
  expires_at: z.string().optional(),
});

const RemoteRunnerSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  status: z.string(),
  busy: z.boolean().optional(),
  labels: z.array(z.object({ name: z.string() })).optional(),
});

const RunnersPageSchema = z.object({
  total_count: z.number().int().min(0),
  runners: z.array(RemoteRunnerSchema),
});

export function classifyHttpStatus(status: number): RemoteApiErrorCategory {
  if (status === 401) return "auth";
  if (status === 403) return "forbidden";
  if (status === 404) return "not-found";
  if (status === 429) return "transient";
  if (status >= 500) return "transient";
  return "client";
}

async function readBodyText(res: Response, maxBytes: number): Promise<string> {
  try {
    const buf = new Uint8Array(await res.arrayBuffer());
    return new TextDecoder("utf-8").decode(buf.slice(0, maxBytes));
  } catch {
    return "";
  }
}

function githubErrorMessage(body: string): string {
  const text = body.trim();
  if (!text) return "";
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === "object" && "message" in parsed && typeof parsed.message === "string") {
      return parsed.message;
    }
  } catch {
    // not JSON; fall through to raw text
  }
  return text.slice(0, 200);
}

function trimBase(url: string): string {
  return url.trim().replace(/\/+$/, "");
}

export class GithubDispatchClient implements DispatchClient {
  readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(params: { apiUrl?: string; timeoutMs?: number; userAgent?: string } = {}) {
    this.apiUrl = trimBase(params.apiUrl ?? DEFAULT_GITHUB_API_URL);
    this.timeoutMs = Math.max(250, Math.min(120_000, Math.trunc(params.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS)));
    this.userAgent = params.userAgent ?? "runnerctl";
    if (!this.apiUrl) throw new ValidationError("github api url required");
  }

  async createRegistrationToken(repository: string, token: string, opts: RequestOptions = {}): Promise<ShortLivedToken> {
    const { id } = parseRepositoryId(repository);
    const path = `/repos/${id}/actions/runners/registration-token`;
    const res = await this.request({ method: "POST", path, token, subject: id, opts });
    return this.parseShortLivedToken(res, path, id);
  }

  async listRunners(repository: string, token: string, opts: RequestOptions = {}): Promise<RemoteRunner[]> {
    const { id } = parseRepositoryId(repository);
    const out: RemoteRunner[] = [];
    for (let page = 1; page <= MAX_RUNNER_PAGES; page += 1) {
      const path = `/repos/${id}/actions/runners?per_page=${RUNNERS_PAGE_SIZE}&page=${page}`;
      const res = await this.request({ method: "GET", path, token, subject: id, opts });
      const body = RunnersPageSchema.safeParse(await this.readJson(res, path, id));
      if (!body.success) {
        throw new RemoteApiError({ category: "malformed", path, subject: id, message: `${path} failed: unexpected response shape` });
      }
      for (const runner of body.data.runners) {
        out.push({
          id: runner.id,
          name: runner.name,
          status: runner.status === "online" ? "online" : "offline",
          busy: runner.busy ?? false,
          labels: (runner.labels ?? []).map((label) => label.name),
        });
      }
      if (body.data.runners.length < RUNNERS_PAGE_SIZE || out.length >= body.data.total_count) break;
    }
    return out;
  }

  async deleteRunner(repository: string, token: string, runnerId: number, opts: RequestOptions = {}): Promise<boolean> {
    const { id } = parseRepositoryId(repository);
    const path = `/repos/${id}/actions/runners/${runnerId}`;
    try {
      await this.request({ method: "DELETE", path, token, subject: id, opts });
      return true;
    } catch (err) {
      if (err instanceof RemoteApiError && err.category === "not-found") return false;
      throw err;
    }
  }

  async checkReachability(opts: RequestOptions = {}): Promise<ReachabilityResult> {
    const started = Date.now();
    try {
      const res = await this.request({ method: "GET", path: "/", subject: "github", opts, acceptStatus: () => true });
      return { ok: true, status: res.status, latencyMs: Date.now() - started };
    } catch (err) {
      return { ok: false, detail: err instanceof Error ? err.message : String(err) };
    }
  }

  private async request(params: {
    method: "GET" | "POST" | "DELETE";
    path: string;
    subject: string;
    token?: string;
    opts: RequestOptions;
    acceptStatus?: (status: number) => boolean;
  }): Promise<Response> {
    const { method, path, subject } = params;
    throwIfAborted(params.opts.signal, `${method} ${path}`);
    const timeoutMs = Math.max(250, Math.trunc(params.opts.timeoutMs ?? this.timeoutMs));
    // Only GET is free of side effects; a failure after sending anything else
    // leaves the remote state unknown.
    const mutating = method !== "GET";
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}${path}`, {
        method,
        headers: {
          "User-Agent": this.userAgent,
          Accept: "application/vnd.github+json",
          "X-GitHub-Api-Version": GITHUB_API_VERSION,
          ...(params.token ? { Authorization: `Bearer ${params.token}` } : {}),
        },
        signal: controller.signal,
      });
    } catch (err) {
      if (isAbortError(err)) {
        throw new RemoteApiError({
          category: "transient",
          path,
          subject,
          remoteAmbiguous: mutating,
          message: `${method} ${path} failed: request timed out after ${timeoutMs}ms`,
          cause: err,
        });
      }
      const detail = err instanceof Error ? err.message : String(err);
      throw new RemoteApiError({
        category: "transient",
        path,
        subject,
        remoteAmbiguous: mutating,
        message: `${method} ${path} failed: network error: ${detail}`,
        cause: err,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (params.acceptStatus?.(response.status) || response.ok) return response;

    const category = classifyHttpStatus(response.status);
    const reason = githubErrorMessage(await readBodyText(response, 2048)) || `http ${response.status}`;
    throw new RemoteApiError({
      category,
      path,
      subject,
      status: response.status,
      remoteAmbiguous: mutating && response.status >= 500,
      message: `${method} ${path} failed: ${reason} (http ${response.status})`,
    });
  }

  private async readJson(res: Response, path: string, subject: string): Promise<unknown> {
    const text = (await res.text()).trim();
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new RemoteApiError({ category: "malformed", path, subject, message: `${path} failed: malformed JSON response`, cause: err });
    }
  }

  private async parseShortLivedToken(res: Response, path: string, subject: string): Promise<ShortLivedToken> {
    const body = ShortLivedTokenSchema.safeParse(await this.readJson(res, path, subject));
    if (!body.success) {
      throw new RemoteApiError({ category: "malformed", path, subject, message: `${path} failed: response carried no token` });
    }
    return { token: body.data.token, expiresAt: body.data.expires_at ?? null };
  }
}
