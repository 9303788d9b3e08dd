import { z } from "zod";

import { env } from "../../config/env.js";
import { ValidationError } from "../../shared/errors.js";

const rateSchema = z.number().min(0).max(1);

export const taxConfigSchema = z.object({
  bonusRate: rateSchema,
  stateBonusRate: rateSchema.default(0)
});

export const auditConfigSchema = z.object({
  section179SoftLimit: z.number().positive().default(1_000_000)
});

export const pipelineConfigSchema = z.object({
  tax: taxConfigSchema,
  audit: auditConfigSchema.default({ section179SoftLimit: 1_000_000 })
});

export type TaxConfig = z.infer<typeof taxConfigSchema>;
export type AuditConfig = z.infer<typeof auditConfigSchema>;
export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export function resolvePipelineConfig(input: unknown): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("Pipeline configuration is invalid.", {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.map(String).join("."),
        message: issue.message
      }))
    });
  }

  return parsed.data;
}

export function defaultPipelineConfig(): PipelineConfig {
  return resolvePipelineConfig({
    tax: {
      bonusRate: env.BONUS_RATE,
      stateBonusRate: env.STATE_BONUS_RATE
    },
    audit: {
      section179SoftLimit: env.SECTION179_SOFT_LIMIT
    }
  });
}
