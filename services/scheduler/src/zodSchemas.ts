import { z } from 'zod';

import { CronClock } from './clocks/cronClock';
import { FLOW_RUN_STATE_TYPES, type JsonValue } from './db/types';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

export const jsonObjectSchema = z.record(jsonValueSchema);

const isoTimestampSchema = z.string().datetime({ offset: true });

export const intervalClockSchema = z
  .object({
    kind: z.literal('interval'),
    intervalSeconds: z.number().int().min(1),
    anchorDate: isoTimestampSchema.nullable().optional()
  })
  .strict();

export const cronClockSchema = z
  .object({
    kind: z.literal('cron'),
    cron: z.string().trim().min(1),
    timezone: z.string().trim().min(1).nullable().optional()
  })
  .strict()
  .superRefine((value, ctx) => {
    try {
      new CronClock(value);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cron'],
        message: `Invalid cron expression: ${err instanceof Error ? err.message : String(err)}`
      });
    }
  });

export const clockDefinitionSchema = z.union([intervalClockSchema, cronClockSchema]);

export const deploymentScheduleCreateSchema = z
  .object({
    id: z.string().uuid().optional(),
    clock: clockDefinitionSchema,
    parameters: jsonObjectSchema.optional(),
    isActive: z.boolean().optional()
  })
  .strict();

export const deploymentCreateSchema = z
  .object({
    id: z.string().uuid().optional(),
    name: z.string().trim().min(1).max(200),
    flowId: z.string().trim().min(1),
    schedules: z.array(deploymentScheduleCreateSchema).optional()
  })
  .strict();

export const flowRunStateTypeSchema = z.enum(FLOW_RUN_STATE_TYPES);

export const flowRunDetailsSchema = z.object({
  scheduleId: z.string().nullable().default(null),
  autoScheduled: z.boolean().default(false)
});

export const flowRunStateDetailsSchema = z.object({
  scheduledTime: z.string().nullable().default(null),
  autoScheduled: z.boolean().default(false),
  scheduleId: z.string().nullable().default(null)
});

export const tagListSchema = z.array(z.string());
