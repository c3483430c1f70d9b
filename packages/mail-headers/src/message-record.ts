import { decodeWords } from "postal-mime";
import {
  DEFAULT_NORMALIZATION_PROFILE,
  type Identity,
  type MessageRecord,
  type NormalizationDiagnostic,
  type NormalizationProfile
} from "@list-archive/shared";
import { parseAddressHeader } from "./address-list.js";
import { parseMessageDate } from "./dates.js";
import { resolveFromIdentity } from "./from-header.js";
import { readHeaderBlock, type HeaderMap } from "./header-block.js";
import { normalizeIdentity } from "./normalize.js";
import { repairHeaderValue, type HeaderRepairer } from "./repair.js";

export type BuildMessageOptions = {
  mailingList: string;
  profile?: NormalizationProfile;
  repair?: HeaderRepairer;
};

export type BuiltMessage = {
  record: MessageRecord;
  diagnostics: NormalizationDiagnostic[];
};

type RecipientField = "to" | "cc";

const EMPTY_IDENTITY: Identity = { name: null, address: null };

function errorDetail(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one field extractor; a throw degrades the field to `fallback` and is
 * reported as a diagnostic instead of failing the message.
 */
function extractField<T>(
  field: string,
  diagnostics: NormalizationDiagnostic[],
  fallback: T,
  extract: () => T
): T {
  try {
    return extract();
  } catch (error) {
    diagnostics.push({ field, code: "field_failed", detail: errorDetail(error) });
    return fallback;
  }
}

function trimmedHeader(headers: HeaderMap, name: string): string | null {
  const value = headers.get(name);
  return value === undefined ? null : value.trim();
}

function decodeSubject(value: string): string {
  return value.includes("=?") ? decodeWords(value) : value;
}

function readRecipients(
  headers: HeaderMap,
  field: RecipientField,
  repair: HeaderRepairer,
  profile: NormalizationProfile,
  diagnostics: NormalizationDiagnostic[]
): Identity[] {
  const raw = headers.get(field);
  if (raw === undefined) {
    return [];
  }
  const repaired = repair(field, raw);
  if (repaired.ruleId !== null) {
    diagnostics.push({ field, code: "header_repaired", detail: repaired.ruleId });
  }
  const parsed = parseAddressHeader(repaired.value);
  if (!parsed.ok) {
    diagnostics.push({ field, code: "address_parse_failed", detail: parsed.error });
    return [];
  }
  return parsed.pairs.map((pair) => normalizeIdentity({ name: pair.displayName, address: pair.address }, profile));
}

export function readInReplyTo(headers: HeaderMap): string | null {
  const inReplyTo = trimmedHeader(headers, "in-reply-to");
  if (inReplyTo) {
    return inReplyTo;
  }
  const references = trimmedHeader(headers, "references");
  if (references) {
    const ids = references.split(/\s+/);
    return ids[ids.length - 1];
  }
  return null;
}

/**
 * Builds the canonical record of one message from its headers. Every field is
 * extracted independently: a field that cannot be read becomes `null` (or an
 * empty recipient list) and the rest of the record is still produced.
 */
export function buildMessageRecord(
  source: Uint8Array | string | HeaderMap,
  options: BuildMessageOptions
): BuiltMessage {
  const profile = options.profile ?? DEFAULT_NORMALIZATION_PROFILE;
  const repair = options.repair ?? repairHeaderValue;
  const diagnostics: NormalizationDiagnostic[] = [];
  const headers = typeof source === "string" || source instanceof Uint8Array ? readHeaderBlock(source) : source;

  const from = extractField("from", diagnostics, EMPTY_IDENTITY, () => {
    const resolution = resolveFromIdentity(headers, { mailingList: options.mailingList, profile, repair });
    diagnostics.push(...resolution.diagnostics);
    return resolution.identity;
  });

  const to = extractField("to", diagnostics, [], () => readRecipients(headers, "to", repair, profile, diagnostics));
  const cc = extractField("cc", diagnostics, [], () => readRecipients(headers, "cc", repair, profile, diagnostics));

  const subject = extractField("subject", diagnostics, null, () => {
    const value = trimmedHeader(headers, "subject");
    return value === null ? null : decodeSubject(value);
  });

  const date = extractField("date", diagnostics, null, () => {
    const value = headers.get("date");
    const parsed = parseMessageDate(value);
    if (value !== undefined && parsed === null) {
      diagnostics.push({ field: "date", code: "date_unparsed", detail: value.trim() });
    }
    return parsed;
  });

  const messageId = extractField("message-id", diagnostics, null, () => trimmedHeader(headers, "message-id"));
  const inReplyTo = extractField("in-reply-to", diagnostics, null, () => readInReplyTo(headers));

  return {
    record: { from, to, cc, subject, date, messageId, inReplyTo },
    diagnostics
  };
}
