import type { Identity, NormalizationDiagnostic, NormalizationProfile } from "@list-archive/shared";
import {
  countAddressSigns,
  parseAddressHeader,
  parseSingleAddress,
  type AddressListEntry,
  type Mailbox
} from "./address-list.js";
import type { HeaderMap } from "./header-block.js";
import { normalizeIdentity } from "./normalize.js";
import type { HeaderRepairer } from "./repair.js";

export const FROM_ALTERNATE_HEADERS = ["x-sender", "x-orig-sender", "sender", "return-path"] as const;

export type FromResolution = {
  identity: Identity;
  diagnostics: NormalizationDiagnostic[];
};

export type FromContext = {
  mailingList: string;
  profile: NormalizationProfile;
  repair: HeaderRepairer;
};

const EMPTY_IDENTITY: Identity = { name: null, address: null };

/**
 * True for addresses that belong to the list software or the archive rather
 * than to a person: bounce and owner addresses of the list, the no-author
 * placeholder, archive-request robots and mailer daemons.
 */
export function isListInfrastructureAddress(
  value: string,
  mailingList: string,
  profile: NormalizationProfile
): boolean {
  const parsed = parseSingleAddress(value).address;
  const address = (parsed === "" ? value.trim().replace(/^<+|>+$/g, "") : parsed).toLowerCase();
  const list = mailingList.toLowerCase();

  if (address === profile.noAuthorAddress.toLowerCase()) {
    return true;
  }
  if (profile.listHostDomains.some((host) => address === `${list}-bounces@${host.toLowerCase()}`)) {
    return true;
  }
  if (profile.archiveRequestAddresses.some((robot) => address === robot.toLowerCase())) {
    return true;
  }
  return (
    address.startsWith(`owner-${list}`) ||
    address.startsWith(`owner-ietf-${list}`) ||
    address.startsWith(`${list}-admin@`) ||
    address.startsWith(`${list}-approval@`) ||
    address.startsWith("mailer-daemon@")
  );
}

/** Groups count only when they hold exactly one member. */
function singleMailbox(entry: AddressListEntry): Mailbox | null {
  if (entry.kind === "mailbox") {
    return entry;
  }
  return entry.members.length === 1 ? entry.members[0] : null;
}

function firstDottedDomain(entries: readonly AddressListEntry[]): Mailbox | null {
  for (const entry of entries) {
    const mailbox = singleMailbox(entry);
    if (!mailbox) {
      continue;
    }
    const at = mailbox.address.lastIndexOf("@");
    if (at !== -1 && mailbox.address.slice(at + 1).includes(".")) {
      return mailbox;
    }
  }
  return null;
}

/**
 * `Last, First <addr>` and `Last, First` spellings are quoted so the comma no
 * longer splits the value into two addresses.
 */
export function quoteLeadingName(value: string): string {
  const match = /^([^,"]+), (.*)$/s.exec(value);
  if (!match) {
    return value;
  }
  const angle = /^([^<]*)(<[^<>]*>)\s*$/.exec(match[2]);
  if (angle) {
    const name = `${match[1]}, ${angle[1]}`.replace(/"/g, "").trim();
    return `"${name}" ${angle[2]}`;
  }
  return `"${match[1]}"`;
}

function resolveAmbiguous(
  headers: HeaderMap,
  fromValue: string,
  context: FromContext,
  diagnostics: NormalizationDiagnostic[]
): Identity {
  for (const header of FROM_ALTERNATE_HEADERS) {
    const raw = headers.get(header);
    if (raw === undefined || raw.trim() === "") {
      continue;
    }
    if (isListInfrastructureAddress(raw, context.mailingList, context.profile)) {
      continue;
    }
    const { value } = context.repair(header, raw);
    const pair = parseSingleAddress(value);
    diagnostics.push({ field: "from", code: "from_alternate_used", detail: header });
    return normalizeIdentity({ name: pair.displayName, address: pair.address }, context.profile);
  }

  const rewritten = quoteLeadingName(fromValue);
  const pair = parseSingleAddress(rewritten);
  diagnostics.push({ field: "from", code: "from_fallback_rewrite", detail: rewritten });

  let name: string | null = pair.displayName;
  let address: string | null = pair.address;
  if (address.toLowerCase() === context.profile.noAuthorAddress.toLowerCase() && name.includes("@")) {
    address = name;
    name = null;
  }
  return normalizeIdentity({ name, address }, context.profile);
}

/**
 * Resolves the author of a message from its From header, falling back to the
 * sender-style headers when the From value cannot be decomposed into the
 * addresses it appears to contain.
 */
export function resolveFromIdentity(headers: HeaderMap, context: FromContext): FromResolution {
  const diagnostics: NormalizationDiagnostic[] = [];
  const raw = headers.get("from");
  if (raw === undefined) {
    return { identity: EMPTY_IDENTITY, diagnostics };
  }

  const repaired = context.repair("from", raw);
  if (repaired.ruleId !== null) {
    diagnostics.push({ field: "from", code: "header_repaired", detail: repaired.ruleId });
  }

  const parsed = parseAddressHeader(repaired.value);
  if (!parsed.ok) {
    diagnostics.push({ field: "from", code: "address_parse_failed", detail: parsed.error });
  }

  const signs = countAddressSigns(repaired.value);
  if (!parsed.ok || (signs > 1 && parsed.pairs.length !== signs)) {
    diagnostics.push({
      field: "from",
      code: "from_ambiguous",
      detail: `${signs} address signs, ${parsed.pairs.length} parsed`
    });
    return { identity: resolveAmbiguous(headers, repaired.value, context, diagnostics), diagnostics };
  }

  if (parsed.pairs.length === 0) {
    return { identity: EMPTY_IDENTITY, diagnostics };
  }

  const [first] = parsed.pairs;
  if (parsed.pairs.length === 1) {
    return {
      identity: normalizeIdentity({ name: first.displayName, address: first.address }, context.profile),
      diagnostics
    };
  }

  const chosen = firstDottedDomain(parsed.entries);
  if (!chosen) {
    return { identity: EMPTY_IDENTITY, diagnostics };
  }
  return {
    identity: normalizeIdentity({ name: chosen.displayName, address: chosen.address }, context.profile),
    diagnostics
  };
}
