import { decodeWords } from "postal-mime";
import type { AddressPair } from "@list-archive/shared";
import { HeaderParseError } from "./errors.js";

type TokenKind = "atom" | "quoted" | "literal" | "comment" | "special";

type Token = {
  kind: TokenKind;
  text: string;
  /** Whitespace or a comment separates this token from the previous one. */
  spaced: boolean;
  position: number;
};

export type Mailbox = {
  kind: "mailbox";
  displayName: string;
  address: string;
};

export type Group = {
  kind: "group";
  label: string;
  members: Mailbox[];
};

export type AddressListEntry = Mailbox | Group;

export type AddressHeaderParse =
  | { ok: true; entries: AddressListEntry[]; pairs: AddressPair[] }
  | { ok: false; entries: []; pairs: []; error: string };

const SPECIALS = new Set(["<", ">", "@", ",", ";", ":"]);
const ATOM_BREAK = /[\s()<>@,;:"[\]]/;
const WHITESPACE = /\s/;
const UNQUOTED_LOCAL_PART = /^[A-Za-z0-9!#$%&'*+\-\/=?^_`{|}~.\u0080-\uffff]+$/;

function readDelimited(
  value: string,
  start: number,
  close: string,
  label: string
): { text: string; end: number } {
  let text = "";
  let index = start + 1;
  while (index < value.length) {
    const char = value[index];
    if (char === "\\" && index + 1 < value.length) {
      text += value[index + 1];
      index += 2;
      continue;
    }
    if (char === close) {
      return { text, end: index + 1 };
    }
    text += char;
    index += 1;
  }
  throw new HeaderParseError({ value, position: start, message: `Unterminated ${label}` });
}

function readComment(value: string, start: number): { text: string; end: number } {
  let depth = 0;
  let text = "";
  let index = start;
  while (index < value.length) {
    const char = value[index];
    if (char === "\\" && index + 1 < value.length) {
      text += value[index + 1];
      index += 2;
      continue;
    }
    if (char === "(") {
      depth += 1;
      if (depth > 1) {
        text += char;
      }
    } else if (char === ")") {
      depth -= 1;
      if (depth === 0) {
        return { text: text.trim(), end: index + 1 };
      }
      text += char;
    } else {
      text += char;
    }
    index += 1;
  }
  throw new HeaderParseError({ value, position: start, message: "Unterminated comment" });
}

function tokenize(value: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;
  let spaced = false;

  while (index < value.length) {
    const char = value[index];

    if (WHITESPACE.test(char)) {
      spaced = true;
      index += 1;
      continue;
    }

    if (char === "(") {
      const comment = readComment(value, index);
      tokens.push({ kind: "comment", text: comment.text, spaced, position: index });
      spaced = true;
      index = comment.end;
      continue;
    }

    if (char === '"') {
      const quoted = readDelimited(value, index, '"', "quoted string");
      tokens.push({ kind: "quoted", text: quoted.text, spaced, position: index });
      spaced = false;
      index = quoted.end;
      continue;
    }

    if (char === "[") {
      const literal = readDelimited(value, index, "]", "domain literal");
      tokens.push({ kind: "literal", text: `[${literal.text}]`, spaced, position: index });
      spaced = false;
      index = literal.end;
      continue;
    }

    if (SPECIALS.has(char)) {
      tokens.push({ kind: "special", text: char, spaced, position: index });
      spaced = false;
      index += 1;
      continue;
    }

    if (char === ")" || char === "]") {
      throw new HeaderParseError({ value, position: index, message: `Unbalanced '${char}'` });
    }

    const start = index;
    let text = "";
    while (index < value.length) {
      const current = value[index];
      if (current === "\\" && index + 1 < value.length) {
        text += value[index + 1];
        index += 2;
        continue;
      }
      if (ATOM_BREAK.test(current)) {
        break;
      }
      text += current;
      index += 1;
    }
    tokens.push({ kind: "atom", text, spaced, position: start });
    spaced = false;
  }

  return tokens;
}

function isSpecial(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === "special" && token.text === text;
}

function decodeDisplayName(text: string): string {
  if (!text.includes("=?")) {
    return text;
  }
  try {
    return decodeWords(text);
  } catch {
    return text;
  }
}

function joinPhrase(words: readonly Token[]): string {
  return words.map((word) => word.text).join(" ");
}

function joinSpaced(words: readonly Token[]): string {
  return words.map((word, index) => (index > 0 && word.spaced ? ` ${word.text}` : word.text)).join("");
}

function quoteLocalPart(localPart: string): string {
  if (localPart === "" || UNQUOTED_LOCAL_PART.test(localPart)) {
    return localPart;
  }
  return `"${localPart.replace(/(["\\])/g, "\\$1")}"`;
}

/**
 * Renders `local@domain` from the tokens of an address-spec; a local part that
 * needs quoting (spaces, specials such as a nested `@`) is quoted.
 */
function renderAddrSpec(parts: readonly Token[]): string {
  const at = parts.findIndex((part) => isSpecial(part, "@"));
  if (at === -1) {
    return joinSpaced(parts);
  }
  const localPart = quoteLocalPart(joinSpaced(parts.slice(0, at)));
  const domain = parts
    .slice(at + 1)
    .map((part) => part.text)
    .join("");
  return `${localPart}@${domain}`;
}

function toMailbox(displayName: string, address: string, comments: readonly string[]): Mailbox {
  const name = displayName === "" ? comments.join(" ").trim() : displayName;
  return {
    kind: "mailbox",
    displayName: decodeDisplayName(name),
    address
  };
}

class AddressListParser {
  private index = 0;

  constructor(
    private readonly value: string,
    private readonly tokens: readonly Token[]
  ) {}

  parse(): AddressListEntry[] {
    const entries: AddressListEntry[] = [];
    for (;;) {
      const token = this.peek();
      if (!token) {
        return entries;
      }
      // Legacy lists separate addresses with ';' as often as with ','.
      if (token.kind === "comment" || isSpecial(token, ",") || isSpecial(token, ";")) {
        this.index += 1;
        continue;
      }
      const entry = this.parseAddress(false);
      if (entry) {
        entries.push(entry);
      }
    }
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private fail(token: Token | undefined, message: string): HeaderParseError {
    return new HeaderParseError({
      value: this.value,
      position: token?.position ?? this.value.length,
      message
    });
  }

  private parseAddress(insideGroup: boolean): AddressListEntry | null {
    const words: Token[] = [];
    const comments: string[] = [];

    for (;;) {
      const token = this.peek();
      if (!token) {
        break;
      }
      if (token.kind === "comment") {
        comments.push(token.text);
        this.index += 1;
        continue;
      }
      if (token.kind === "special") {
        if (token.text === "<") {
          this.index += 1;
          const address = this.parseAngleAddress(token);
          this.skipTrailingWords();
          return toMailbox(joinPhrase(words), address, comments);
        }
        if (token.text === ":") {
          if (insideGroup) {
            throw this.fail(token, "Nested group");
          }
          this.index += 1;
          return this.parseGroupBody(joinPhrase(words));
        }
        if (token.text === ">") {
          throw this.fail(token, "Unexpected '>'");
        }
        if (token.text !== "@") {
          break;
        }
      }
      words.push(token);
      this.index += 1;
    }

    if (words.length === 0) {
      return null;
    }
    return this.toBareMailbox(words, comments);
  }

  private parseGroupBody(label: string): Group {
    const members: Mailbox[] = [];
    for (;;) {
      const token = this.peek();
      if (!token) {
        break;
      }
      if (isSpecial(token, ";")) {
        this.index += 1;
        break;
      }
      if (token.kind === "comment" || isSpecial(token, ",")) {
        this.index += 1;
        continue;
      }
      const member = this.parseAddress(true);
      if (member && member.kind === "mailbox") {
        members.push(member);
      }
    }
    return { kind: "group", label: decodeDisplayName(label), members };
  }

  private parseAngleAddress(opening: Token): string {
    // Obsolete source route: <@relay.example,@other.example:user@host>
    if (isSpecial(this.peek(), "@")) {
      while (this.peek() && !isSpecial(this.peek(), ":") && !isSpecial(this.peek(), ">")) {
        this.index += 1;
      }
      if (isSpecial(this.peek(), ":")) {
        this.index += 1;
      }
    }

    const parts: Token[] = [];
    for (;;) {
      const token = this.peek();
      if (!token) {
        throw this.fail(opening, "Unterminated angle address");
      }
      this.index += 1;
      if (token.kind === "comment") {
        continue;
      }
      if (token.kind === "special" && token.text !== "@") {
        if (token.text === ">") {
          return renderAddrSpec(parts);
        }
        throw this.fail(token, `Unexpected '${token.text}' in angle address`);
      }
      parts.push(token);
    }
  }

  private skipTrailingWords(): void {
    for (;;) {
      const token = this.peek();
      if (!token || (token.kind === "special" && token.text !== "@")) {
        return;
      }
      this.index += 1;
    }
  }

  /**
   * Mailbox written without angle brackets. The address is the run of tokens
   * touching the first `@`; words outside that run form the display name.
   */
  private toBareMailbox(words: readonly Token[], comments: readonly string[]): Mailbox {
    const at = words.findIndex((word) => isSpecial(word, "@"));
    if (at === -1) {
      return toMailbox("", joinSpaced(words), comments);
    }

    let start = at;
    if (start > 0) {
      start -= 1;
      while (start > 0 && !words[start].spaced) {
        start -= 1;
      }
    }

    let end = at + 1;
    while (end < words.length && (end === at + 1 || !words[end].spaced)) {
      end += 1;
    }

    const address = renderAddrSpec(words.slice(start, end));
    const nameWords = [...words.slice(0, start), ...words.slice(end)];
    return toMailbox(joinPhrase(nameWords), address, comments);
  }
}

export function parseAddressList(value: string): AddressListEntry[] {
  return new AddressListParser(value, tokenize(value)).parse();
}

/**
 * Groups contribute their members; an empty group contributes nothing.
 */
export function flattenAddressList(entries: readonly AddressListEntry[]): AddressPair[] {
  const pairs: AddressPair[] = [];
  for (const entry of entries) {
    const mailboxes = entry.kind === "group" ? entry.members : [entry];
    for (const mailbox of mailboxes) {
      pairs.push({ displayName: mailbox.displayName, address: mailbox.address });
    }
  }
  return pairs;
}

export function parseAddressHeader(value: string): AddressHeaderParse {
  try {
    const entries = parseAddressList(value);
    return { ok: true, entries, pairs: flattenAddressList(entries) };
  } catch (error) {
    if (error instanceof HeaderParseError) {
      return { ok: false, entries: [], pairs: [], error: error.message };
    }
    throw error;
  }
}

/**
 * First mailbox of the value, or an empty pair when nothing parses.
 */
export function parseSingleAddress(value: string): AddressPair {
  const parsed = parseAddressHeader(value);
  return parsed.pairs[0] ?? { displayName: "", address: "" };
}

/**
 * Counts `@` signs that can belong to an address. A free-standing " @ " (as in
 * "Ed @ OTT") is prose, not an address separator.
 */
export function countAddressSigns(value: string): number {
  let count = 0;
  for (let index = 0; index < value.length; index += 1) {
    if (value[index] !== "@") {
      continue;
    }
    const before = index > 0 ? value[index - 1] : "";
    const after = index + 1 < value.length ? value[index + 1] : "";
    if (WHITESPACE.test(before) && WHITESPACE.test(after)) {
      continue;
    }
    count += 1;
  }
  return count;
}
