export interface CleaningRule {
  pattern: RegExp;
  replacement: string;
}

/**
 * Applied in order; later rules see the output of earlier ones.
 */
export const CLEANING_RULES: readonly CleaningRule[] = [
  { pattern: /<thinking>[\s\S]*?<\/thinking>/gi, replacement: "" },
  { pattern: /<reasoning>[\s\S]*?<\/reasoning>/gi, replacement: "" },
  { pattern: /<\/?[a-z_]+>/gi, replacement: "" },
  {
    pattern: /^(?:Here(?: is| are|['’]s)|Based on|The answer is|In summary)[:\s]*/i,
    replacement: "",
  },
];

/**
 * Service for turning raw model completions into presentable text
 */
export class ResponseCleaner {
  constructor(private readonly rules: readonly CleaningRule[] = CLEANING_RULES) {}

  /**
   * Strip reasoning tags and filler, collapse whitespace and capitalize.
   * Repeats until stable so cleaning twice equals cleaning once; rules must
   * only remove text for this to terminate.
   */
  clean(text: string): string {
    if (!text) return text;

    let current = text;
    let next = this.cleanOnce(current);
    while (next !== current) {
      current = next;
      next = this.cleanOnce(current);
    }
    return current;
  }

  private cleanOnce(text: string): string {
    let cleaned = this.rules.reduce(
      (acc, rule) => acc.replace(rule.pattern, rule.replacement),
      text
    );

    cleaned = cleaned.replace(/\s+/g, " ").trim();

    if (/^\p{Ll}/u.test(cleaned)) {
      const [first] = cleaned;
      cleaned = first.toUpperCase() + cleaned.slice(first.length);
    }

    return cleaned;
  }
}

export const responseCleaner = new ResponseCleaner();
