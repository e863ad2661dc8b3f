/**
 * Input Guard
 * Length limits, injection pattern screening and content policy for questions
 */

import { logger } from "../logger.js";
import type { RejectionReason } from "../types/rag.js";

export interface ThreatPattern {
  readonly type:
    | "XSS_ATTEMPT"
    | "SCRIPT_URI"
    | "SQL_INJECTION"
    | "CODE_INJECTION";
  readonly severity: "HIGH" | "CRITICAL";
  readonly pattern: RegExp;
}

export interface PolicyPattern {
  readonly category: string;
  readonly pattern: RegExp;
}

export type ValidationResult =
  | { readonly ok: true; readonly value: string }
  | {
      readonly ok: false;
      readonly reason: RejectionReason;
      readonly message: string;
    };

export interface InputGuardOptions {
  readonly maxLength: number;
  readonly threatPatterns?: readonly ThreatPattern[];
  readonly policyPatterns?: readonly PolicyPattern[];
}

export const DEFAULT_THREAT_PATTERNS: readonly ThreatPattern[] = [
  { type: "XSS_ATTEMPT", severity: "CRITICAL", pattern: /<script\b[^>]*>/i },
  { type: "SCRIPT_URI", severity: "CRITICAL", pattern: /javascript:/i },
  { type: "SCRIPT_URI", severity: "CRITICAL", pattern: /vbscript:/i },
  { type: "SCRIPT_URI", severity: "HIGH", pattern: /data:text\/html/i },
  { type: "SQL_INJECTION", severity: "CRITICAL", pattern: /\bunion\b.*\bselect\b/i },
  { type: "SQL_INJECTION", severity: "CRITICAL", pattern: /\bdrop\b.*\btable\b/i },
  { type: "CODE_INJECTION", severity: "CRITICAL", pattern: /\beval\s*\(/i },
  { type: "CODE_INJECTION", severity: "CRITICAL", pattern: /\bexec\s*\(/i },
];

export const DEFAULT_POLICY_PATTERNS: readonly PolicyPattern[] = [
  {
    category: "Security-related content",
    pattern: /\b(hack|exploit|vulnerability)\b/i,
  },
  {
    category: "Illegal activity content",
    pattern: /\b(illegal|criminal|fraud)\b/i,
  },
  {
    category: "Harmful content",
    pattern: /\b(violence|harmful|dangerous)\b/i,
  },
];

export class InputGuard {
  private readonly maxLength: number;
  private readonly threatPatterns: readonly ThreatPattern[];
  private readonly policyPatterns: readonly PolicyPattern[];

  constructor(options: InputGuardOptions) {
    this.maxLength = options.maxLength;
    this.threatPatterns = options.threatPatterns ?? DEFAULT_THREAT_PATTERNS;
    this.policyPatterns = options.policyPatterns ?? DEFAULT_POLICY_PATTERNS;
  }

  /**
   * Validate a raw question. Rejections are ordinary results, never thrown.
   */
  validate(rawText: string): ValidationResult {
    if (!rawText || !rawText.trim()) {
      return { ok: false, reason: "empty", message: "Empty input not allowed" };
    }

    const length = Array.from(rawText).length;
    if (length > this.maxLength) {
      logger.debug("Input rejected for length", {
        length,
        maxLength: this.maxLength,
      });
      return {
        ok: false,
        reason: "too_long",
        message: `Input too long. Maximum ${this.maxLength} characters allowed.`,
      };
    }

    const threat = this.detectThreat(rawText);
    if (threat) {
      logger.security("MALICIOUS_INPUT_DETECTED", "CRITICAL", {
        threatType: threat.type,
        patternSeverity: threat.severity,
        pattern: threat.pattern.source,
      });
      return {
        ok: false,
        reason: "malicious_pattern",
        message: "Input contains potentially malicious content",
      };
    }

    const cleaned = sanitizeInput(rawText);
    // Markup-only questions leave nothing to answer
    if (!cleaned) {
      return { ok: false, reason: "empty", message: "Empty input not allowed" };
    }

    const violation = this.checkContentPolicy(cleaned);
    if (violation) {
      logger.security("CONTENT_POLICY_VIOLATION", "WARNING", {
        category: violation.category,
      });
      return {
        ok: false,
        reason: "policy_violation",
        message: `Content violates policy: ${violation.category}`,
      };
    }

    return { ok: true, value: cleaned };
  }

  private detectThreat(text: string): ThreatPattern | null {
    return this.threatPatterns.find(({ pattern }) => pattern.test(text)) ?? null;
  }

  private checkContentPolicy(text: string): PolicyPattern | null {
    return this.policyPatterns.find(({ pattern }) => pattern.test(text)) ?? null;
  }
}

/**
 * Strip HTML tags and collapse whitespace
 */
export function sanitizeInput(text: string): string {
  return text
    .replace(/<[^>]+>/g, "")
    .replace(/\s+/g, " ")
    .trim();
}
