export type HeaderMap = ReadonlyMap<string, string>;

const HEADER_LINE = /^([!-9;-~]+)[ \t]*:(.*)$/s;
const FOLD = /\r?\n(?=[ \t])/g;
const BLANK_LINE = /\r?\n\r?\n/;
const NUL = /\u0000/g;

/**
 * Reads the header section of a raw message: everything before the first
 * empty line. Folded lines are joined, names are lower-cased, and the first
 * occurrence of a repeated header wins. Lines that are not `name: value` are
 * skipped. NUL characters are dropped.
 */
export function readHeaderBlock(raw: Uint8Array | string): HeaderMap {
  const text = typeof raw === "string" ? raw : Buffer.from(raw).toString("utf8");
  const end = text.search(BLANK_LINE);
  const block = (end === -1 ? text : text.slice(0, end)).replace(FOLD, "").replace(NUL, "");

  const headers = new Map<string, string>();
  for (const line of block.split(/\r?\n/)) {
    const match = HEADER_LINE.exec(line);
    if (!match) {
      continue;
    }
    const name = match[1].toLowerCase();
    if (headers.has(name)) {
      continue;
    }
    headers.set(name, match[2].replace(/^[ \t\r\n]+/, "").replace(/[\r\n]+$/, ""));
  }
  return headers;
}
