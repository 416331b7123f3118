import { createLogger, Logger } from "./logger.js";

export const MAX_INPUT_LENGTH = 1000;

const ENTITY_REGEX = /&(amp|lt|gt|quot|#39);/g;

const ENTITY_CHARACTERS: Readonly<Record<string, string>> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  "#39": "'",
};

const DANGEROUS_PATTERNS: RegExp[] = [
  /;.*/s,
  /`.*/s,
  /\$\(.*\)/s,
  /\|.*/s,
  /&&.*/s,
  /<.*/s,
  />.*/s,
];

const EDGE_PUNCTUATION_REGEX = /^[\p{P}\p{S}]+|[\p{P}\p{S}]+$/gu;

export const STOP_WORDS: ReadonlySet<string> = new Set([
  "は",
  "が",
  "を",
  "に",
  "で",
  "と",
  "の",
  "も",
  "へ",
  "や",
  "か",
  "ね",
  "よ",
  "から",
  "まで",
  "より",
  "です",
  "ます",
  "ですか",
  "ますか",
  "でした",
  "ました",
  "について",
  "ください",
  "教えて",
  "the",
  "and",
  "for",
  "with",
  "what",
  "how",
  "is",
  "are",
]);

const defaultLogger = createLogger("sanitize");

/**
 * Normalizes user text before it reaches keyword extraction or a prompt.
 * Returns "" for anything that must not be processed.
 *
 * Works on the decoded text, so feeding the output back in yields the same
 * output.
 */
export function sanitizeText(raw: unknown, logger: Logger = defaultLogger): string {
  if (typeof raw !== "string") {
    return "";
  }

  const text = decodeMarkup(raw).trim().slice(0, MAX_INPUT_LENGTH).trimEnd();
  if (!text) {
    return "";
  }

  const matched = DANGEROUS_PATTERNS.find((pattern) => pattern.test(text));
  if (matched) {
    logger.warn("Rejected input containing a dangerous pattern", {
      pattern: matched.source,
    });
    return "";
  }

  return escapeMarkup(text);
}

export function escapeMarkup(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Reverses `escapeMarkup` in a single pass. */
export function decodeMarkup(text: string): string {
  return text.replace(ENTITY_REGEX, (entity: string, name: string) => ENTITY_CHARACTERS[name] ?? entity);
}

export function stripEdgePunctuation(token: string): string {
  return token.replace(EDGE_PUNCTUATION_REGEX, "");
}

export function splitOnWhitespace(text: string): string[] {
  return text.split(/\s+/u).filter((part) => part.length > 0);
}
