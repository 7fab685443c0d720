import { z } from "zod";

export const REGISTRATION_STATES = ["unregistered", "registering", "registered", "removing"] as const;
export type RegistrationState = (typeof REGISTRATION_STATES)[number];

export const HEALTH_VERDICTS = ["healthy", "degraded", "unhealthy", "unknown"] as const;
export type HealthVerdict = (typeof HEALTH_VERDICTS)[number];

export const FINDING_SEVERITIES = ["info", "warning", "error"] as const;
export type FindingSeverity = (typeof FINDING_SEVERITIES)[number];

export const HealthFindingSchema = z.object({
  check: z.string(),
  severity: z.enum(FINDING_SEVERITIES),
  message: z.string(),
});

export type HealthFinding = z.infer<typeof HealthFindingSchema>;

export const HealthSnapshotSchema = z.object({
  verdict: z.enum(HEALTH_VERDICTS),
  findings: z.array(HealthFindingSchema),
  checkedAt: z.string(),
});

export type HealthSnapshot = z.infer<typeof HealthSnapshotSchema>;

export const RunnerInstanceSchema = z.object({
  name: z.string().min(1),
  repository: z.string().min(1),
  labels: z.array(z.string()),
  registrationState: z.enum(REGISTRATION_STATES),
  remoteId: z.number().int().nullable(),
  pid: z.number().int().nullable(),
  startedAt: z.string().nullable(),
  ephemeral: z.boolean(),
  lastHealth: HealthSnapshotSchema.nullable(),
  warnings: z.array(z.string()),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type RunnerInstance = z.infer<typeof RunnerInstanceSchema>;

export const RegistryFileSchema = z.object({
  version: z.literal(1),
  instances: z.array(RunnerInstanceSchema),
});

export type RegistryFile = z.infer<typeof RegistryFileSchema>;

// Fields callers may change without a state transition.
export type RunnerInstancePatch = Partial<
  Pick<RunnerInstance, "labels" | "remoteId" | "pid" | "startedAt" | "ephemeral" | "warnings">
>;

export const ALLOWED_TRANSITIONS: Readonly<Record<RegistrationState, readonly RegistrationState[]>> = {
  unregistered: ["registering", "registered"],
  registering: ["registered", "unregistered"],
  registered: ["removing", "unregistered"],
  removing: ["unregistered", "registered"],
};

export function canTransition(from: RegistrationState, to: RegistrationState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}
