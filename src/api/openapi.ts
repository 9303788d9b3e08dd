const errorResponses = {
  "400": { description: "Validation error" },
  "422": { description: "Compliance or risk threshold failure" }
};

export function buildOpenApiDocument() {
  return {
    openapi: "3.1.0",
    info: {
      title: "Return Review Engine API",
      version: "1.0.0",
      description: "Federal return computation, risk scoring, compliance validation and escalation."
    },
    servers: [
      {
        url: "/v1"
      }
    ],
    components: {
      schemas: {
        ErrorResponse: {
          type: "object",
          required: ["code", "message", "details", "requestId"],
          properties: {
            code: { type: "string" },
            message: { type: "string" },
            details: {},
            requestId: { type: ["string", "null"] }
          }
        }
      }
    },
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: {
            "200": {
              description: "Service health"
            }
          }
        }
      },
      "/rulesets": {
        get: {
          summary: "List ruleset versions",
          responses: {
            "200": { description: "Active ruleset and known versions" }
          }
        }
      },
      "/rulesets/{id}": {
        get: {
          summary: "Get a federal ruleset",
          parameters: [
            {
              name: "id",
              in: "path",
              required: true,
              schema: { type: "string" }
            }
          ],
          responses: {
            "200": { description: "Validated ruleset" },
            "404": { description: "Unknown ruleset" }
          }
        }
      },
      "/returns/compute": {
        post: {
          summary: "Compute a federal return",
          responses: {
            "200": { description: "Computed return with audit assessment" },
            ...errorResponses
          }
        }
      },
      "/returns/review": {
        post: {
          summary: "Compute and review a return for human escalation",
          responses: {
            "200": { description: "Compliance, risk, safety and escalation results" },
            ...errorResponses
          }
        }
      },
      "/returns/filing-check": {
        post: {
          summary: "Block on structural compliance before filing",
          responses: {
            "200": { description: "Return passed compliance validation" },
            ...errorResponses
          }
        }
      },
      "/returns/scenarios": {
        post: {
          summary: "Compare baseline, conservative and aggressive depreciation",
          responses: {
            "200": { description: "Scenario outcomes" },
            ...errorResponses
          }
        }
      },
      "/tax/estimate": {
        post: {
          summary: "Simple federal tax estimate",
          responses: {
            "200": { description: "Tax estimate with bracket breakdown and credits" },
            "400": { description: "Validation error" }
          }
        }
      }
    }
  };
}
