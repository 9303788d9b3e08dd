import type { SafetyContext, SafetyResult } from "./types.js";

const prohibitedPatterns: RegExp[] = [
  /\byou should\b/i,
  /\bI recommend\b/i,
  /\bto reduce your taxes\b/i,
  /\bclaim this deduction\b/i,
  /\byour best option\b/i,
  /\bfile as\b/i,
  /\bhack\b/i,
  /\bavoid paying\b/i,
  /\bhiding income\b/i,
  /\bunderground\b/i,
  /\boffshore\b/i,
  /\bevasion\b/i
];

const educationalFraming: RegExp[] = [
  /\bgeneral information\b/i,
  /\beducational purposes\b/i,
  /\bnot tax advice\b/i,
  /\bIRS generally\b/i,
  /\bthe tax code provides\b/i
];

const neutralRewrites: Array<[RegExp, string]> = [
  [/\byou should\b/gi, "one common approach is"],
  [/\bI recommend\b/gi, "the tax code allows"],
  [/\byour\b/gi, "a taxpayer's"]
];

export const supportedJurisdictions = ["US"] as const;

export const personalFields = ["ssn", "taxpayerId", "exactIncome", "specificDeductionAmount"] as const;

export const REQUIRED_DISCLAIMER =
  "This information is for general educational purposes only and does not constitute legal or tax advice.";

export function hasProhibitedLanguage(text: string): boolean {
  return prohibitedPatterns.some((pattern) => pattern.test(text));
}

export function hasEducationalFraming(text: string): boolean {
  return educationalFraming.some((pattern) => pattern.test(text));
}

export function hasDisclaimer(text: string): boolean {
  return text.toLowerCase().includes(REQUIRED_DISCLAIMER.toLowerCase());
}

function withDisclaimer(text: string): string {
  return hasDisclaimer(text) ? text : `${text}\n\n${REQUIRED_DISCLAIMER}`;
}

export function sanitizeResponse(text: string): string {
  const rewritten = neutralRewrites.reduce(
    (current, [pattern, replacement]) => current.replace(pattern, replacement),
    text
  );
  return withDisclaimer(rewritten);
}

function isSupportedJurisdiction(jurisdiction: string): boolean {
  return supportedJurisdictions.some((code) => code === jurisdiction);
}

function isPersonalized(context: SafetyContext): boolean {
  const fields = context.personalFields ?? [];
  return personalFields.some((field) => fields.includes(field));
}

/**
 * Gate for generated explanatory text. Denies by default on unsupported
 * jurisdictions, personalized context or advisory phrasing; otherwise returns
 * the text with educational framing and the disclaimer attached.
 */
export function safetyGate(text: string, context: SafetyContext = {}): SafetyResult {
  if (!isSupportedJurisdiction(context.jurisdiction ?? "US")) {
    return { allowed: false, reason: "Unsupported tax jurisdiction.", sanitizedResponse: null };
  }

  if (isPersonalized(context)) {
    return { allowed: false, reason: "Personalized tax advice is not permitted.", sanitizedResponse: null };
  }

  if (hasProhibitedLanguage(text)) {
    return {
      allowed: false,
      reason: "Response contains prohibited or advisory language.",
      sanitizedResponse: null
    };
  }

  const framed = hasEducationalFraming(text) ? text : sanitizeResponse(text);

  return { allowed: true, reason: null, sanitizedResponse: withDisclaimer(framed) };
}
