import { z } from 'zod';
import {
  REPORT_SCHEMA_VERSION,
  type AttemptResult,
  type Report,
  type StageDescriptor,
  type Task,
} from './types';

export const StageKindSchema = z.enum(['deploy', 'tests', 'functional', 'bulk', 'tweak']);

const stageBase = {
  weight: z.number().min(0),
  timeoutMs: z.number().int().positive().optional(),
  gate: z.boolean().optional(),
};

const FieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const OutcomeVerificationSchema = z.object({
  command: z.string().min(1),
  expect: z.object({
    recordCount: z.number().int().min(0).optional(),
    fields: z.array(z.object({ field: z.string().min(1), value: FieldValueSchema })).optional(),
  }),
});

const scenario = {
  setup: z.array(z.string().min(1)).default([]),
  command: z.string().min(1).optional(),
  verify: OutcomeVerificationSchema.optional(),
};

export const StageDescriptorSchema: z.ZodType<StageDescriptor, z.ZodTypeDef, unknown> =
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('deploy'), ...stageBase, sourceDir: z.string().optional() }),
    z.object({
      kind: z.literal('tests'),
      ...stageBase,
      command: z.string().min(1),
      minCoverage: z.number().min(0).max(100).optional(),
      requiredTests: z.number().int().positive().optional(),
    }),
    z.object({ kind: z.literal('functional'), ...stageBase, ...scenario }),
    z.object({
      kind: z.literal('bulk'),
      ...stageBase,
      ...scenario,
      scale: z.number().int().positive().default(200),
    }),
    z.object({ kind: z.literal('tweak'), ...stageBase, ignore: z.array(z.string()).default([]) }),
  ]);

// Weights are compared with a tolerance so fractional weights such as 33.3 still add up.
const WEIGHT_EPSILON = 1e-6;

export const TaskSchema: z.ZodType<Task, z.ZodTypeDef, unknown> = z
  .object({
    id: z
      .string()
      .min(1)
      .regex(/^[A-Za-z0-9._-]+$/, 'Task id may only contain letters, digits, ".", "_" and "-"'),
    title: z.string().optional(),
    repo: z.object({
      url: z.string().min(1),
      revision: z.string().min(1),
    }),
    problemStatement: z.string(),
    totalPoints: z.number().positive().default(100),
    timeouts: z
      .object({
        attemptMs: z.number().int().positive().optional(),
        stageMs: z.number().int().positive().optional(),
      })
      .default({}),
    stages: z.array(StageDescriptorSchema).min(1),
    tags: z.array(z.string()).default([]),
  })
  .superRefine((task, ctx) => {
    const sum = task.stages.reduce((acc, stage) => acc + stage.weight, 0);
    if (Math.abs(sum - task.totalPoints) > WEIGHT_EPSILON) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['stages'],
        message: `Stage weights sum to ${sum}, expected ${task.totalPoints}`,
      });
    }

    const seen = new Set<string>();
    task.stages.forEach((stage, index) => {
      if (seen.has(stage.kind)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['stages', index, 'kind'],
          message: `Duplicate stage kind "${stage.kind}"`,
        });
      }
      seen.add(stage.kind);

      if ((stage.kind === 'functional' || stage.kind === 'bulk') && !stage.command && !stage.verify) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['stages', index],
          message: `Stage "${stage.kind}" needs a command or a verify query`,
        });
      }
    });
  });

const StageResultSchema = z.object({
  kind: StageKindSchema,
  status: z.enum(['pass', 'fail', 'error', 'skipped']),
  message: z.string(),
  score: z.number(),
  weight: z.number(),
  fraction: z.number().min(0).max(1),
  durationMs: z.number(),
  details: z.record(z.unknown()).default({}),
});

export const AttemptResultSchema: z.ZodType<AttemptResult, z.ZodTypeDef, unknown> = z.object({
  taskId: z.string(),
  modelId: z.string(),
  solution: z.object({
    source: z.enum(['file', 'generator', 'none']),
    digest: z.string(),
    empty: z.boolean(),
  }),
  patch: z.object({
    applied: z.boolean(),
    strategyUsed: z.string().optional(),
    filesChanged: z.array(z.string()),
    rejectedFiles: z.array(z.string()),
  }),
  stages: z.array(StageResultSchema),
  score: z.number(),
  maxScore: z.number(),
  classification: z.enum(['resolved', 'failed', 'errored']),
  state: z.enum([
    'pending',
    'deploying',
    'testing',
    'functional-check',
    'bulk-check',
    'tweak-check',
    'scored',
    'failed',
    'errored',
  ]),
  failure: z
    .object({
      kind: z.enum(['ModelFailure', 'PlatformConstraint', 'ToolError']),
      code: z.string(),
      message: z.string(),
      stage: StageKindSchema.optional(),
      constraint: z.string().optional(),
      cancelled: z.boolean().optional(),
      timeout: z.boolean().optional(),
    })
    .optional(),
  envId: z.string().optional(),
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number(),
});

const StagePassRateSchema = z.object({
  passed: z.number(),
  attempted: z.number(),
  rate: z.number(),
});

export const ReportSchema: z.ZodType<Report, z.ZodTypeDef, unknown> = z.object({
  schemaVersion: z.literal(REPORT_SCHEMA_VERSION),
  runId: z.string(),
  modelId: z.string(),
  configDigest: z.string(),
  startedAt: z.string(),
  finishedAt: z.string(),
  cancelled: z.boolean(),
  results: z.array(AttemptResultSchema),
  summary: z.object({
    total: z.number(),
    resolved: z.number(),
    failed: z.number(),
    errored: z.number(),
    resolutionRate: z.number(),
    averageScore: z.number(),
    medianScore: z.number(),
    minScore: z.number(),
    maxScore: z.number(),
    averageDurationMs: z.number(),
    stagePassRates: z.record(StageKindSchema, StagePassRateSchema),
    platformConstraintFailures: z.number(),
    emptyPatchCount: z.number(),
  }),
  resolvedIds: z.array(z.string()),
  failedIds: z.array(z.string()),
  erroredIds: z.array(z.string()),
  emptyPatchIds: z.array(z.string()),
});

/**
 * Renders zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}
