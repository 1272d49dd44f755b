import { z } from 'zod';

export const CONFIG_VERSION = 1;

export const RunConfigSchema = z.object({
  maxWorkers: z.number().int().positive().default(3),
  /** Wall-clock budget for the whole run; unset means no deadline */
  deadlineMs: z.number().int().positive().optional(),
  outputDir: z.string().default('.patchproof/runs'),
  workspaceDir: z.string().default('.patchproof/workspaces'),
  keepWorkspaces: z.boolean().default(false),
});

export const ScoringConfigSchema = z.object({
  resolveThreshold: z.number().min(0).default(80),
});

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  initialDelayMs: z.number().int().min(0).default(2000),
  backoffFactor: z.number().min(1).default(2),
  maxDelayMs: z.number().int().min(0).default(8000),
});

export const TimeoutsConfigSchema = z.object({
  /** Scales every timeout below and every per-task/per-stage timeout */
  multiplier: z.number().positive().default(1),
  stageMs: z.number().int().positive().default(300_000),
  attemptMs: z.number().int().positive().default(1_800_000),
  patchMs: z.number().int().positive().default(60_000),
  cloneMs: z.number().int().positive().default(300_000),
});

export const EnvironmentCommandsSchema = z.object({
  create: z
    .string()
    .default(
      'sf org create scratch --alias {alias} --definition-file {definitionFile} --duration-days {durationDays} --json',
    ),
  deploy: z.string().default('sf project deploy start --source-dir {sourceDir} --target-org {envId} --json'),
  /** Wraps every task command; `{command}` alone runs the task command as written */
  run: z.string().default('{command}'),
  destroy: z.string().default('sf org delete scratch --target-org {envId} --no-prompt --json'),
  /** Run once before any worker starts; a failure ends the run before anything is provisioned */
  preflight: z.string().optional(),
});

export const EnvironmentConfigSchema = z.object({
  commands: EnvironmentCommandsSchema.default({}),
  /** Dotted path of the environment id inside the create command's JSON output */
  idPath: z.string().default('result.username'),
  /** Dotted path, in the pre-flight command's JSON output, of how many environments can still be created */
  capacityPath: z.string().optional(),
  definitionFile: z.string().default('config/project-scratch-def.json'),
  durationDays: z.number().int().positive().default(1),
  aliasPrefix: z.string().default('patchproof'),
  createTimeoutMs: z.number().int().positive().default(600_000),
  deployTimeoutMs: z.number().int().positive().default(600_000),
  commandTimeoutMs: z.number().int().positive().default(300_000),
  destroyTimeoutMs: z.number().int().positive().default(120_000),
  /** Extra environment variables passed through to provider commands */
  envAllowlist: z.array(z.string()).default([]),
  /** Task commands with pipes, redirects or substitutions run through the shell; false refuses them */
  allowShell: z.boolean().default(true),
  /** Regular expressions added to the built-in provisioning error classes */
  transientPatterns: z.array(z.string()).default([]),
  terminalPatterns: z.array(z.string()).default([]),
  platformConstraintPatterns: z.array(z.string()).default([]),
});

export const PatchConfigSchema = z.object({
  fuzzFactor: z.number().int().min(0).default(3),
  maxFilesChanged: z.number().int().positive().default(200),
  maxLinesTouched: z.number().int().positive().default(20_000),
});

export const CheckpointConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** `restart` discards an untrusted checkpoint; `abort` refuses to start */
  onMismatch: z.enum(['restart', 'abort']).default('restart'),
});

export const TweakCheckConfigSchema = z.object({
  /** Path prefixes written by deployment tooling, excluded from the status comparison */
  ignore: z.array(z.string()).default(['.sf/', '.sfdx/', 'node_modules/']),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const HarnessConfigSchema = z.object({
  configVersion: z.literal(CONFIG_VERSION).default(CONFIG_VERSION),
  run: RunConfigSchema.default({}),
  scoring: ScoringConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  timeouts: TimeoutsConfigSchema.default({}),
  environment: EnvironmentConfigSchema.default({}),
  patch: PatchConfigSchema.default({}),
  checkpoint: CheckpointConfigSchema.default({}),
  tweakCheck: TweakCheckConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type EnvironmentConfig = z.infer<typeof EnvironmentConfigSchema>;
export type PatchConfig = z.infer<typeof PatchConfigSchema>;
export type TimeoutsConfig = z.infer<typeof TimeoutsConfigSchema>;

/**
 * A fully defaulted configuration.
 */
export function defaultConfig(): HarnessConfig {
  return HarnessConfigSchema.parse({});
}

/**
 * Applies `timeouts.multiplier` to a timeout in milliseconds.
 */
export function scaleTimeout(ms: number, config: Pick<HarnessConfig, 'timeouts'>): number {
  return Math.round(ms * config.timeouts.multiplier);
}
