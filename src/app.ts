import cors from "@fastify/cors";
import sensible from "@fastify/sensible";
import Fastify from "fastify";
import { ZodError } from "zod";

import { buildOpenApiDocument } from "./api/openapi.js";
import {
  computeReturnSchema,
  federalEstimateSchema,
  parseTaxpayer,
  reviewReturnSchema,
  rulesetListQuerySchema,
  rulesetParamsSchema,
  scenarioRequestSchema
} from "./api/schemas.js";
import { env } from "./config/env.js";
import { loadFederalRuleset, loadRulesetMeta, resolveActiveRulesetForTaxYear } from "./domain/rulesets/loader.js";
import type { FederalRuleset } from "./domain/rulesets/types.js";
import { defaultPipelineConfig } from "./domain/tax/config.js";
import { estimateFederalTax } from "./domain/tax/filing.js";
import { resolveLogLevel } from "./infrastructure/logger.js";
import { createReturnPipeline } from "./services/return-service.js";
import type { ReturnPipeline } from "./services/return-service.js";
import { simulateScenarios } from "./services/scenario-service.js";
import { TaxEngineError } from "./shared/errors.js";

interface PipelineOverrides {
  tax?: { bonusRate?: number; stateBonusRate?: number };
  audit?: { section179SoftLimit?: number };
}

// Fastify and plugin errors carry statusCode and code as plain properties.
function errorProperty(error: Error, key: "statusCode" | "code"): unknown {
  return Reflect.get(error, key);
}

export interface BuildAppOptions {
  ruleset?: FederalRuleset;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const apiPrefix = "/v1";
  const ruleset = options.ruleset ?? loadFederalRuleset();
  const defaults = defaultPipelineConfig();
  const basePipeline = createReturnPipeline({ ruleset, config: defaults });

  const app = Fastify({
    logger: { level: resolveLogLevel() },
    disableRequestLogging: false
  });

  await app.register(sensible);
  await app.register(cors, {
    origin: env.CORS_ORIGINS.includes("*") ? true : env.CORS_ORIGINS,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
    credentials: false
  });

  function pipelineFor(overrides: PipelineOverrides | undefined): ReturnPipeline {
    if (!overrides) {
      return basePipeline;
    }

    return createReturnPipeline({
      ruleset,
      config: {
        tax: { ...defaults.tax, ...overrides.tax },
        audit: { ...defaults.audit, ...overrides.audit }
      }
    });
  }

  app.setErrorHandler<Error>(async (error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({
        code: "VALIDATION_ERROR",
        message: "Request validation failed.",
        details: error.flatten(),
        requestId: request.id
      });
    }

    if (error instanceof TaxEngineError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, "tax engine failure");
      }

      return reply.code(error.statusCode).send({
        code: error.code,
        message: error.message,
        details: error.details,
        requestId: request.id
      });
    }

    const status = errorProperty(error, "statusCode");
    const statusCode = typeof status === "number" ? status : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "unhandled error");
      return reply.code(500).send({
        code: "INTERNAL_ERROR",
        message: "Internal server error.",
        details: null,
        requestId: request.id
      });
    }

    const code = errorProperty(error, "code");
    return reply.code(statusCode).send({
      code: typeof code === "string" ? code : "REQUEST_ERROR",
      message: error.message,
      details: null,
      requestId: request.id
    });
  });

  app.get("/health", async () => ({
    ok: true
  }));

  app.get("/openapi.json", async () => buildOpenApiDocument());

  app.get(`${apiPrefix}/health`, async () => ({
    ok: true,
    version: "v1",
    ruleset: ruleset.id
  }));

  app.get(`${apiPrefix}/rulesets`, async (request) => {
    const { taxYear } = rulesetListQuerySchema.parse(request.query);
    const meta = loadRulesetMeta();
    return {
      active: meta.active,
      activeForTaxYear: taxYear === undefined ? null : resolveActiveRulesetForTaxYear(taxYear),
      versions: meta.versions.map((version) => ({
        id: version.id,
        jurisdiction: version.jurisdiction,
        effectiveFrom: version.effectiveFrom,
        status: version.status
      }))
    };
  });

  app.get(`${apiPrefix}/rulesets/:id`, async (request) => {
    const { id } = rulesetParamsSchema.parse(request.params);
    if (!loadRulesetMeta().versions.some((version) => version.id === id)) {
      throw app.httpErrors.notFound("Ruleset not found.");
    }

    return loadFederalRuleset(id);
  });

  app.post(`${apiPrefix}/returns/compute`, async (request) => {
    const body = computeReturnSchema.parse(request.body);
    return pipelineFor(body.config).computeReturn(parseTaxpayer(body.taxpayer));
  });

  app.post(`${apiPrefix}/returns/review`, async (request) => {
    const body = reviewReturnSchema.parse(request.body);
    return pipelineFor(body.config).reviewReturn(parseTaxpayer(body.taxpayer), {
      priorYearDeductions: body.priorYearDeductions,
      narrative: body.narrative,
      safetyContext: body.safetyContext
    });
  });

  app.post(`${apiPrefix}/returns/filing-check`, async (request) => {
    const body = computeReturnSchema.parse(request.body);
    const check = pipelineFor(body.config).checkFiling(parseTaxpayer(body.taxpayer));
    return {
      readyToFile: check.compliance.compliant,
      irsReturn: check.irsReturn,
      compliance: check.compliance
    };
  });

  app.post(`${apiPrefix}/returns/scenarios`, async (request) => {
    const body = scenarioRequestSchema.parse(request.body);
    return {
      scenarios: simulateScenarios(pipelineFor(body.config), parseTaxpayer(body.taxpayer), {
        riskCeiling: body.riskCeiling
      })
    };
  });

  app.post(`${apiPrefix}/tax/estimate`, async (request) => {
    const body = federalEstimateSchema.parse(request.body);
    return estimateFederalTax(ruleset, {
      ...body,
      earnedIncome: body.earnedIncome ?? body.grossIncome
    });
  });

  return app;
}
