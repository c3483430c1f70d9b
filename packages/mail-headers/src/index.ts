export {
  countAddressSigns,
  flattenAddressList,
  parseAddressHeader,
  parseAddressList,
  parseSingleAddress
} from "./address-list.js";
export type { AddressHeaderParse, AddressListEntry, Group, Mailbox } from "./address-list.js";

export { formatUtcTimestamp, parseMessageDate, parseRfc5322Date } from "./dates.js";
export type { DateParts } from "./dates.js";

export { HeaderParseError } from "./errors.js";

export {
  FROM_ALTERNATE_HEADERS,
  isListInfrastructureAddress,
  quoteLeadingName,
  resolveFromIdentity
} from "./from-header.js";
export type { FromContext, FromResolution } from "./from-header.js";

export { readHeaderBlock } from "./header-block.js";
export type { HeaderMap } from "./header-block.js";

export { buildMessageRecord, readInReplyTo } from "./message-record.js";
export type { BuildMessageOptions, BuiltMessage } from "./message-record.js";

export { normalizeAddress, normalizeDisplayName, normalizeIdentity } from "./normalize.js";

export {
  ADDRESS_HEADERS,
  STRUCTURAL_RULES,
  createHeaderRepairer,
  loadRewriteRules,
  repairHeaderValue
} from "./repair.js";
export type { HeaderRepairer, RepairResult, RepairRule } from "./repair.js";
