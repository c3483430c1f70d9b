/**
 * Stable identity of one archived message. `uidvalidity` changes whenever the
 * remote folder is recreated, so `uid` alone is never a key.
 */
export type RawMessageKey = {
  mailingList: string;
  uidvalidity: number;
  uid: number;
};

export type RawMessage = RawMessageKey & {
  raw: Uint8Array;
};

/**
 * Normalized mail participant.
 * Absent fields are `null`; an empty string is never produced by the normalizer.
 * Determinism rule: address is lowercase.
 */
export type Identity = {
  readonly name: string | null;
  readonly address: string | null;
};

/**
 * Raw structural parse output, before normalization.
 */
export type AddressPair = {
  displayName: string;
  address: string;
};

export type MessageRecord = {
  readonly from: Identity;
  readonly to: readonly Identity[];
  readonly cc: readonly Identity[];
  readonly subject: string | null;
  /** UTC, `YYYY-MM-DD HH:MM:SS` */
  readonly date: string | null;
  readonly messageId: string | null;
  readonly inReplyTo: string | null;
};

export type FolderSummary = {
  mailingList: string;
  messageCount: number;
  firstDate: string | null;
  lastDate: string | null;
};

export type DiagnosticCode =
  | "header_repaired"
  | "address_parse_failed"
  | "from_ambiguous"
  | "from_alternate_used"
  | "from_fallback_rewrite"
  | "date_unparsed"
  | "field_failed";

export type NormalizationDiagnostic = {
  field: string;
  code: DiagnosticCode;
  detail?: string;
};

/**
 * Per-corpus constants consumed by the normalizer and the From fallback chain.
 */
export type NormalizationProfile = {
  /** Suffixes appended to display names by relaying tools, e.g. " via Datatracker". */
  nameSuffixes: readonly string[];
  /** Domains that DMARC-rewrite sender addresses, e.g. "dmarc.ietf.org". */
  dmarcRelayDomains: readonly string[];
  /** Placeholder suffixes list software appends to forced-unsubscribe addresses. */
  addressJunkSuffixes: readonly string[];
  /** Address used when a message has no recorded author. */
  noAuthorAddress: string;
  /** Hosts that serve `<list>-bounces@` addresses. */
  listHostDomains: readonly string[];
  /** Historical archive-request addresses that never identify an author. */
  archiveRequestAddresses: readonly string[];
};

export const DEFAULT_NORMALIZATION_PROFILE: NormalizationProfile = {
  nameSuffixes: [" via Datatracker"],
  dmarcRelayDomains: ["dmarc.ietf.org"],
  addressJunkSuffixes: [".RemoveThisWord"],
  noAuthorAddress: "noreply@ietf.org",
  listHostDomains: ["ietf.org", "lists.ietf.org"],
  archiveRequestAddresses: [
    "ietf-archive-request@IETF.NRI.Reston.VA.US",
    "ietf-archive-request@IETF.CNRI.Reston.VA.US"
  ]
};

export const DATE_SENTINEL_FIRST = "2038-01-19 03:14:07";
export const DATE_SENTINEL_LAST = "1970-01-01 00:00:00";
