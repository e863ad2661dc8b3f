/**
 * PII Redactor
 * Replaces SSNs, card numbers, emails and phone numbers with fixed placeholders
 */

export interface RedactionRule {
  readonly name: string;
  readonly pattern: RegExp;
  readonly replacement: string;
}

// Order matters: card numbers before phone numbers so a 16-digit group is not
// partially consumed as a phone number.
export const DEFAULT_REDACTION_RULES: readonly RedactionRule[] = [
  {
    name: "ssn",
    pattern: /\b\d{3}-\d{2}-\d{4}\b/g,
    replacement: "[SSN_REDACTED]",
  },
  {
    name: "card",
    pattern: /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g,
    replacement: "[CARD_REDACTED]",
  },
  {
    name: "email",
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
    replacement: "[EMAIL_REDACTED]",
  },
  {
    name: "phone",
    pattern: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
    replacement: "[PHONE_REDACTED]",
  },
];

const MAX_PASSES = 8;

export class Redactor {
  constructor(
    private readonly rules: readonly RedactionRule[] = DEFAULT_REDACTION_RULES
  ) {}

  /**
   * Redact until a fixed point so the result is stable under another pass.
   * With the default rules every replacement removes digits or an "@".
   */
  redact(text: string): string {
    let current = text;

    for (let pass = 0; pass < MAX_PASSES; pass++) {
      const next = this.applyRules(current);
      if (next === current) break;
      current = next;
    }

    return current;
  }

  private applyRules(text: string): string {
    return this.rules.reduce(
      (redacted, rule) => redacted.replace(rule.pattern, rule.replacement),
      text
    );
  }
}
