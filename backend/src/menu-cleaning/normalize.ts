import { compileRule, type RegexRule } from "./config";

const BRACKET_NOISE = /[[\]()"“”?\\]+/g;
const LEADING_APOSTROPHES = /^'+/;
const POSSESSIVE_UPPER_S = /(['’])S\b/g;
const ALNUM = /[\p{L}\p{N}]/u;

const compiled = new WeakMap<RegexRule, RegExp>();

export function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

export function emptyToNull(input: string | null | undefined): string | null {
  if (input == null) return null;
  return input.trim() === "" ? null : input;
}

export function stripBracketedNoise(input: string | null | undefined): string | null {
  if (input == null) return null;
  const withoutNoise = input.replace(BRACKET_NOISE, "").trim();
  const out = collapseWhitespace(withoutNoise.replace(LEADING_APOSTROPHES, ""));
  return out || null;
}

export function uppercaseFold(input: string | null | undefined): string | null {
  if (input == null) return null;
  return input.toUpperCase();
}

// Capitalizes the first character of every alphanumeric run and lowers the
// rest; "'S" at a word end goes back to "'s" so possessives survive.
export function titleCaseFix(input: string | null | undefined): string | null {
  if (input == null) return null;

  let out = "";
  let prevAlnum = false;
  for (const ch of input) {
    const isAlnum = ALNUM.test(ch);
    if (isAlnum) {
      out += prevAlnum ? ch.toLowerCase() : ch.toUpperCase();
    } else {
      out += ch;
    }
    prevAlnum = isAlnum;
  }

  return out.replace(POSSESSIVE_UPPER_S, "$1s");
}

export function applyRegexRules(input: string, rules: RegexRule[]): string {
  let out = input;
  for (const rule of rules) {
    out = out.replace(ruleRegex(rule), rule.replacement);
  }
  return out;
}

export function ocrCorrect(input: string | null | undefined, rules: RegexRule[]): string | null {
  if (input == null) return null;
  return applyRegexRules(input, rules);
}

export function placeholderToNull(
  input: string | null | undefined,
  patterns: string[]
): string | null {
  if (input == null) return null;
  const lowered = input.toLowerCase();
  for (const pattern of patterns) {
    if (pattern && lowered.includes(pattern.toLowerCase())) return null;
  }
  return input;
}

export function stripWrappingQuotes(input: string | null | undefined): string | null {
  if (input == null) return null;
  const trimmed = input.trim();
  if (trimmed.length < 2 || !trimmed.startsWith('"') || !trimmed.endsWith('"')) {
    return emptyToNull(trimmed);
  }
  return emptyToNull(trimmed.replace(/^"+|"+$/g, "").trim());
}

// "Dakota; The" -> "The Dakota". The article is written as given.
export function moveTrailingArticle(input: string | null | undefined, article = "The"): string | null {
  if (input == null) return null;
  const match = /^(.+?);\s*the$/i.exec(input.trim());
  if (!match) return input;
  return `${article} ${match[1].trim()}`;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function ruleRegex(rule: RegexRule): RegExp {
  let regex = compiled.get(rule);
  if (!regex) {
    regex = compileRule(rule);
    compiled.set(rule, regex);
  }
  return regex;
}
