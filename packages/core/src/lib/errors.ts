export type RunnerctlErrorKind =
  | "auth"
  | "not-found"
  | "corrupt-record"
  | "conflict"
  | "invalid-state"
  | "remote-api"
  | "start-timeout"
  | "stop-timeout"
  | "worker-process"
  | "codec"
  | "validation";

// Exit codes are part of the CLI contract; scripts branch on them.
export const EXIT_CODES = {
  ok: 0,
  generic: 1,
  auth: 2,
  notFound: 3,
  network: 4,
  conflict: 5,
  corrupt: 6,
  timeout: 7,
} as const;

export class RunnerctlError extends Error {
  readonly kind: RunnerctlErrorKind;
  readonly subject?: string;
  readonly remediation?: string;
  // Set when the failure may have left state behind on GitHub.
  remoteAmbiguous: boolean;

  constructor(params: {
    kind: RunnerctlErrorKind;
    message: string;
    subject?: string;
    remediation?: string;
    remoteAmbiguous?: boolean;
    cause?: unknown;
  }) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "RunnerctlError";
    this.kind = params.kind;
    this.subject = params.subject;
    this.remediation = params.remediation;
    this.remoteAmbiguous = params.remoteAmbiguous ?? false;
  }

  get exitCode(): number {
    return EXIT_CODES.generic;
  }
}

export class AuthError extends RunnerctlError {
  constructor(subject: string, message = `wrong password for ${subject}`, remediation = "re-enter the vault password") {
    super({ kind: "auth", message, subject, remediation });
    this.name = "AuthError";
  }

  override get exitCode(): number {
    return EXIT_CODES.auth;
  }
}

export class NotFoundError extends RunnerctlError {
  constructor(subject: string, message: string, remediation?: string) {
    super({ kind: "not-found", message, subject, remediation });
    this.name = "NotFoundError";
  }

  override get exitCode(): number {
    return EXIT_CODES.notFound;
  }
}

export class CorruptRecordError extends RunnerctlError {
  constructor(subject: string, message: string, cause?: unknown) {
    super({
      kind: "corrupt-record",
      message,
      subject,
      remediation: "clear the vault entry and save the token again",
      cause,
    });
    this.name = "CorruptRecordError";
  }

  override get exitCode(): number {
    return EXIT_CODES.corrupt;
  }
}

export class ConflictError extends RunnerctlError {
  constructor(subject: string, message: string, remediation = "choose a different runner name or reuse the existing one") {
    super({ kind: "conflict", message, subject, remediation });
    this.name = "ConflictError";
  }

  override get exitCode(): number {
    return EXIT_CODES.conflict;
  }
}

export class InvalidStateError extends RunnerctlError {
  constructor(subject: string, message: string, remediation?: string) {
    super({ kind: "invalid-state", message, subject, remediation });
    this.name = "InvalidStateError";
  }

  override get exitCode(): number {
    return EXIT_CODES.conflict;
  }
}

export type RemoteApiErrorCategory = "auth" | "forbidden" | "not-found" | "client" | "transient" | "malformed";

function remediationForCategory(category: RemoteApiErrorCategory): string {
  switch (category) {
    case "auth":
      return "check the stored token (it may be expired or revoked)";
    case "forbidden":
      return "the token needs admin access to the repository (repo scope)";
    case "not-found":
      return "check the repository name and that the token can see it";
    case "transient":
      return "check network connectivity and retry";
    default:
      return "inspect the request and retry";
  }
}

export class RemoteApiError extends RunnerctlError {
  readonly category: RemoteApiErrorCategory;
  readonly status?: number;
  readonly path: string;

  constructor(params: {
    category: RemoteApiErrorCategory;
    path: string;
    message: string;
    status?: number;
    subject?: string;
    remoteAmbiguous?: boolean;
    cause?: unknown;
  }) {
    super({
      kind: "remote-api",
      message: params.message,
      subject: params.subject,
      remediation: remediationForCategory(params.category),
      remoteAmbiguous: params.remoteAmbiguous,
      cause: params.cause,
    });
    this.name = "RemoteApiError";
    this.category = params.category;
    this.status = params.status;
    this.path = params.path;
  }

  get retryable(): boolean {
    return this.category === "transient";
  }

  override get exitCode(): number {
    if (this.category === "auth" || this.category === "forbidden") return EXIT_CODES.auth;
    if (this.category === "not-found") return EXIT_CODES.notFound;
    if (this.category === "transient") return EXIT_CODES.network;
    return EXIT_CODES.generic;
  }
}

export class StartTimeoutError extends RunnerctlError {
  readonly timeoutMs: number;

  constructor(subject: string, timeoutMs: number) {
    super({
      kind: "start-timeout",
      message: `runner ${subject} did not report a listening handshake within ${timeoutMs}ms`,
      subject,
      remediation: "check the runner logs; the registration may need to be removed and re-registered",
    });
    this.name = "StartTimeoutError";
    this.timeoutMs = timeoutMs;
  }

  override get exitCode(): number {
    return EXIT_CODES.timeout;
  }
}

export class StopTimeoutError extends RunnerctlError {
  readonly pid: number | null;

  constructor(subject: string, pid: number | null) {
    super({
      kind: "stop-timeout",
      message: `runner ${subject} (pid ${pid ?? "unknown"}) survived SIGKILL`,
      subject,
      remediation: "inspect the process manually",
    });
    this.name = "StopTimeoutError";
    this.pid = pid;
  }

  override get exitCode(): number {
    return EXIT_CODES.timeout;
  }
}

export class WorkerProcessError extends RunnerctlError {
  readonly processExitCode: number | null;
  readonly stderrTail: string;

  constructor(params: { subject: string; message: string; exitCode: number | null; stderrTail?: string }) {
    super({
      kind: "worker-process",
      message: params.message,
      subject: params.subject,
      remediation: "check the runner directory and the agent output above",
    });
    this.name = "WorkerProcessError";
    this.processExitCode = params.exitCode;
    this.stderrTail = params.stderrTail ?? "";
  }
}

export class CodecError extends RunnerctlError {
  constructor(message: string) {
    super({ kind: "codec", message });
    this.name = "CodecError";
  }
}

export class ValidationError extends RunnerctlError {
  constructor(message: string, subject?: string) {
    super({ kind: "validation", message, subject });
    this.name = "ValidationError";
  }
}

export function isRunnerctlError(error: unknown): error is RunnerctlError {
  return error instanceof RunnerctlError;
}
