export type TaxEngineErrorCode =
  | "VALIDATION_ERROR"
  | "COMPLIANCE_ERROR"
  | "RISK_THRESHOLD_EXCEEDED"
  | "SCENARIO_FAILED";

export class TaxEngineError extends Error {
  readonly code: TaxEngineErrorCode;
  readonly statusCode: number;
  readonly details: Record<string, unknown> | null;

  constructor(
    code: TaxEngineErrorCode,
    statusCode: number,
    message: string,
    details: Record<string, unknown> | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

// Malformed or out-of-domain input: unknown filing status, unsupported recovery period, negative amounts.
export class ValidationError extends TaxEngineError {
  constructor(message: string, details: Record<string, unknown> | null = null) {
    super("VALIDATION_ERROR", 400, message, details);
  }
}

export class ComplianceError extends TaxEngineError {
  constructor(message: string, details: Record<string, unknown> | null = null) {
    super("COMPLIANCE_ERROR", 422, message, details);
  }
}

export class RiskThresholdError extends TaxEngineError {
  constructor(message: string, details: Record<string, unknown> | null = null) {
    super("RISK_THRESHOLD_EXCEEDED", 422, message, details);
  }
}

export class ScenarioError extends TaxEngineError {
  constructor(message: string, cause: unknown, details: Record<string, unknown> | null = null) {
    super(
      "SCENARIO_FAILED",
      cause instanceof TaxEngineError ? cause.statusCode : 500,
      message,
      details,
      { cause }
    );
  }
}
