import { readFileSync } from "node:fs";
import { countAddressSigns } from "./address-list.js";

export type RepairRule = {
  id: string;
  /** Returns the rewritten value, or `null` when the rule leaves it unchanged. */
  rewrite(value: string): string | null;
};

export type RepairResult = {
  value: string;
  ruleId: string | null;
};

export const ADDRESS_HEADERS: ReadonlySet<string> = new Set([
  "from",
  "to",
  "cc",
  "sender",
  "reply-to",
  "x-sender",
  "x-orig-sender",
  "return-path"
]);

const REWRITES_URL = new URL("./rules/address-rewrites.json", import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readRewriteEntry(entry: unknown, index: number): RepairRule {
  if (
    !isRecord(entry) ||
    typeof entry.id !== "string" ||
    typeof entry.pattern !== "string" ||
    typeof entry.replacement !== "string"
  ) {
    throw new Error(`Invalid address rewrite at index ${index}`);
  }
  const pattern = new RegExp(entry.pattern, "g");
  const replacement = entry.replacement;
  return {
    id: entry.id,
    rewrite(value) {
      pattern.lastIndex = 0;
      const rewritten = value.replace(pattern, replacement);
      return rewritten === value ? null : rewritten;
    }
  };
}

export function loadRewriteRules(source: URL = REWRITES_URL): RepairRule[] {
  const parsed: unknown = JSON.parse(readFileSync(source, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`Address rewrite table must be an array: ${source.pathname}`);
  }
  return parsed.map((entry, index) => readRewriteEntry(entry, index));
}

function countOccurrences(value: string, needle: string): number {
  let count = 0;
  let from = value.indexOf(needle);
  while (from !== -1) {
    count += 1;
    from = value.indexOf(needle, from + needle.length);
  }
  return count;
}

const NAME_BEFORE_ANGLE = /^([^<>]*)(<[^<>]*>)\s*$/;

export const STRUCTURAL_RULES: readonly RepairRule[] = [
  {
    id: "stray-escaped-quote",
    rewrite(value) {
      if (countOccurrences(value, '\\"') !== 1) {
        return null;
      }
      return value.replace('\\"', "");
    }
  },
  {
    id: "escaped-parens-in-name",
    rewrite(value) {
      const match = NAME_BEFORE_ANGLE.exec(value);
      if (!match || !/\\[()]/.test(match[1])) {
        return null;
      }
      const name = match[1].replace(/\\([()])/g, "$1").replace(/"/g, "").trim();
      return `"${name}" ${match[2]}`;
    }
  },
  {
    id: "spelled-out-at",
    rewrite(value) {
      if (value.includes("@") || countOccurrences(value, " at ") !== 1) {
        return null;
      }
      return value.replace(" at ", "@");
    }
  },
  {
    id: "comma-in-display-name",
    rewrite(value) {
      const match = NAME_BEFORE_ANGLE.exec(value);
      if (!match) {
        return null;
      }
      const name = match[1].trim();
      if (!name.includes(",") || name.includes('"') || countAddressSigns(name) > 0) {
        return null;
      }
      return `"${name}" ${match[2]}`;
    }
  },
  {
    id: "quoted-bare-address",
    rewrite(value) {
      const match = /^\s*"([^"\\\s,<>]+@[^"\\\s,<>]+)"\s*$/.exec(value);
      return match ? match[1] : null;
    }
  }
];

export type HeaderRepairer = (name: string, value: string) => RepairResult;

/**
 * Rules are tried in order and the first one that changes the value wins; the
 * result is not fed back through the chain.
 */
export function createHeaderRepairer(
  rules: readonly RepairRule[] = [...loadRewriteRules(), ...STRUCTURAL_RULES]
): HeaderRepairer {
  return (name, value) => {
    if (!ADDRESS_HEADERS.has(name.toLowerCase())) {
      return { value, ruleId: null };
    }
    for (const rule of rules) {
      const rewritten = rule.rewrite(value);
      if (rewritten !== null) {
        return { value: rewritten, ruleId: rule.id };
      }
    }
    return { value, ruleId: null };
  };
}

let defaultRepairer: HeaderRepairer | undefined;

export function repairHeaderValue(name: string, value: string): RepairResult {
  defaultRepairer ??= createHeaderRepairer();
  return defaultRepairer(name, value);
}
