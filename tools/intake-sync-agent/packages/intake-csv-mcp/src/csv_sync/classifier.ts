import { DEFAULT_FORM_NAME } from "../config.js";

export type ClassifierOptions = {
  keywords?: string[];
  fallbackName?: string;
  defaultName?: string;
};

const PRICE_PREFIX = /^(free|paid|\$\d+)/i;
const GENERIC_SESSION_WORDS = ["help desk", "q&a", "session", "appointment", "workshop"];
const MAX_NAME_LENGTH = 100;

/**
 * Maps appointment type labels such as "FREE | Startup Essentials (Jane Doe)" to a stable,
 * filesystem-safe category name. Heuristic: keywords pick the segment that names the
 * category; price tags and advisor names are skipped.
 */
export class FormNameClassifier {
  readonly keywords: string[];
  readonly fallbackName: string;
  readonly defaultName: string;

  constructor(options: ClassifierOptions = {}) {
    this.keywords = (options.keywords ?? []).map((keyword) => keyword.trim().toLowerCase()).filter(Boolean);
    this.defaultName = options.defaultName || DEFAULT_FORM_NAME;
    this.fallbackName = options.fallbackName || this.defaultName;
  }

  classify(label: string): string {
    const parts = label.split("|").map((part) => part.trim());
    return this.clean(this.pickSegment(parts));
  }

  fileNameFor(label: string): string {
    return `${this.classify(label)}.csv`;
  }

  looksLikePersonName(text: string): boolean {
    if (text.split(/\s+/).filter(Boolean).length > 5) {
      return false;
    }
    if (!/^\p{Lu}/u.test(text)) {
      return false;
    }
    const lowered = text.toLowerCase();
    if (this.hasKeyword(lowered)) {
      return false;
    }
    return !GENERIC_SESSION_WORDS.some((word) => lowered.includes(word));
  }

  private pickSegment(parts: string[]): string {
    for (const part of parts) {
      if (PRICE_PREFIX.test(part)) {
        continue;
      }
      if (part.includes("(") && part.includes(")")) {
        const beforeParen = part.split("(")[0].trim();
        if (this.hasKeyword(beforeParen.toLowerCase())) {
          return beforeParen;
        }
        if (this.looksLikePersonName(beforeParen)) {
          continue;
        }
      }
      if (this.hasKeyword(part.toLowerCase())) {
        return part;
      }
    }
    return this.fallbackSegment(parts);
  }

  private fallbackSegment(parts: string[]): string {
    const label = parts.join(" | ");
    const first = parts[0] ?? label;
    if (first.includes("(") && this.looksLikePersonName(first.split("(")[0].trim())) {
      return this.fallbackName;
    }

    const likelyName =
      parts.length <= 2 &&
      label.split(/\s+/).filter(Boolean).length <= 4 &&
      /^\p{Lu}/u.test(label) &&
      !this.hasKeyword(label.toLowerCase());
    if (likelyName) {
      return this.fallbackName;
    }

    const meaningful = parts.find((part) => part.length > 10 && !PRICE_PREFIX.test(part));
    if (meaningful) {
      return meaningful;
    }
    return label || this.fallbackName;
  }

  private clean(name: string): string {
    const cleaned = name
      .replace(/^[^:]+:\s*/, "")
      .replace(/^(free|paid|\$\d+)\s*\|\s*/i, "")
      .replace(/\s*\([^)]*\)/g, "")
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, "_")
      .replace(/^_+|_+$/g, "");
    if (cleaned.length < 3) {
      return this.defaultName;
    }
    return cleaned.slice(0, MAX_NAME_LENGTH);
  }

  private hasKeyword(lowered: string): boolean {
    return this.keywords.some((keyword) => lowered.includes(keyword));
  }
}
