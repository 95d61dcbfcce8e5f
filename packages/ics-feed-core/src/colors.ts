import { readFileSync } from "node:fs";
import type { ColorRule } from "./types.js";

const NAMED_COLORS: ReadonlySet<string> = new Set(
  JSON.parse(readFileSync(new URL("./colors.json", import.meta.url), "utf8")) as string[]
);

/** CSS3 colour names. */
export function isNamedColor(token: string): boolean {
  return NAMED_COLORS.has(token.toLowerCase());
}

type CompiledRule = {
  readonly needle: string;
  readonly colour: string;
};

/**
 * Ordered title-to-colour rules. A rule matches when its name occurs anywhere in the
 * event summary, ignoring case; the first matching rule in configured order wins.
 */
export class ColorRuleTable {
  private readonly rules: readonly CompiledRule[];

  constructor(rules: readonly ColorRule[] = []) {
    this.rules = Object.freeze(
      rules.map((rule) => Object.freeze({ needle: rule.name.toLowerCase(), colour: rule.colour.toLowerCase() }))
    );
  }

  get size(): number {
    return this.rules.length;
  }

  colorFor(summary: string): string | undefined {
    const haystack = summary.toLowerCase();
    return this.rules.find((rule) => rule.needle.length > 0 && haystack.includes(rule.needle))?.colour;
  }
}
