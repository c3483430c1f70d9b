import {
  DEFAULT_NORMALIZATION_PROFILE,
  type Identity,
  type NormalizationProfile
} from "@list-archive/shared";
import { parseSingleAddress } from "./address-list.js";

type NormalizationStep = {
  id: string;
  apply(value: string, profile: NormalizationProfile): string;
};

function stripEdges(value: string, leading: string, trailing: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && leading.includes(value[start])) {
    start += 1;
  }
  while (end > start && trailing.includes(value[end - 1])) {
    end -= 1;
  }
  return value.slice(start, end);
}

function endsWithIgnoreCase(value: string, suffix: string): boolean {
  return suffix !== "" && value.toLowerCase().endsWith(suffix.toLowerCase());
}

/** Removes every trailing repeat of whichever suffix matches. */
function stripRepeatedSuffix(value: string, suffixes: readonly string[], ignoreCase: boolean): string {
  let current = value;
  for (;;) {
    const suffix = suffixes.find((candidate) =>
      ignoreCase ? endsWithIgnoreCase(current, candidate) : candidate !== "" && current.endsWith(candidate)
    );
    if (!suffix) {
      return current;
    }
    current = current.slice(0, -suffix.length);
  }
}

function decodeRelayEscapes(localPart: string): string {
  return localPart.replace(/=([0-9a-f]{2})/g, (escape: string, hex: string) => {
    const code = Number.parseInt(hex, 16);
    return code > 0x20 && code < 0x7f ? String.fromCharCode(code) : escape;
  });
}

function unwrap(value: string, quote: string): string {
  return value.length >= 2 && value.startsWith(quote) && value.endsWith(quote)
    ? value.slice(1, -1)
    : value;
}

const NAME_STEPS: readonly NormalizationStep[] = [
  {
    id: "trim-quotes",
    apply: (value) => stripEdges(value, "'\" ", "'\" ")
  },
  {
    id: "relay-suffix",
    apply: (value, profile) => stripRepeatedSuffix(value, profile.nameSuffixes, false)
  }
];

const ADDRESS_STEPS: readonly NormalizationStep[] = [
  {
    id: "lowercase",
    apply: (value) => value.toLowerCase()
  },
  {
    id: "dmarc-relay",
    apply(value, profile) {
      const domain = profile.dmarcRelayDomains.find((candidate) =>
        endsWithIgnoreCase(value, `@${candidate}`)
      );
      return domain ? decodeRelayEscapes(value.slice(0, -(domain.length + 1))) : value;
    }
  },
  {
    // "minshall@wc.novell.com"@decpa.enet.dec.com -> minshall@wc.novell.com
    id: "nested-mailbox",
    apply(value) {
      const segments = value.split("@");
      if (segments.length !== 3 || !segments[0].startsWith('"') || !segments[1].endsWith('"')) {
        return value;
      }
      const nested = unwrap(unwrap(`${segments[0]}@${segments[1]}`, "'"), '"');
      const { address } = parseSingleAddress(nested);
      return address === "" ? value : address;
    }
  },
  {
    id: "spelled-out-at",
    apply: (value) => (value.includes("@") ? value : value.replace(" at ", "@"))
  },
  {
    id: "stray-delimiters",
    apply: (value) => stripEdges(value, "\"'<", "\"'>")
  },
  {
    id: "junk-suffix",
    apply: (value, profile) => stripRepeatedSuffix(value, profile.addressJunkSuffixes, true)
  },
  {
    id: "on-behalf-of",
    apply(value) {
      const marker = value.indexOf(" on behalf of ");
      return marker === -1 ? value : value.slice(0, marker);
    }
  },
  {
    // Anything still carrying several "@" keeps its rightmost mailbox.
    id: "rightmost-mailbox",
    apply(value) {
      const segments = value.split("@");
      return segments.length > 2 ? segments.slice(-2).join("@") : value;
    }
  },
  {
    id: "trim",
    apply: (value) => value.trim()
  }
];

/**
 * Runs the steps in order, repeating the whole chain until a pass changes
 * nothing, so that the result is a fixed point of the chain. A value seen
 * before ends the loop as well.
 */
function runToFixedPoint(
  value: string,
  steps: readonly NormalizationStep[],
  profile: NormalizationProfile
): string {
  const seen = new Set<string>();
  let current = value;
  while (!seen.has(current)) {
    seen.add(current);
    const next = steps.reduce((acc, step) => step.apply(acc, profile), current);
    if (next === current) {
      break;
    }
    current = next;
  }
  return current;
}

export function normalizeDisplayName(
  name: string | null | undefined,
  profile: NormalizationProfile = DEFAULT_NORMALIZATION_PROFILE
): string | null {
  if (name === null || name === undefined) {
    return null;
  }
  const normalized = runToFixedPoint(name, NAME_STEPS, profile);
  return normalized === "" ? null : normalized;
}

export function normalizeAddress(
  address: string | null | undefined,
  profile: NormalizationProfile = DEFAULT_NORMALIZATION_PROFILE
): string | null {
  if (address === null || address === undefined) {
    return null;
  }
  const normalized = runToFixedPoint(address, ADDRESS_STEPS, profile);
  return normalized === "" ? null : normalized;
}

export function normalizeIdentity(
  input: { name: string | null; address: string | null },
  profile: NormalizationProfile = DEFAULT_NORMALIZATION_PROFILE
): Identity {
  return {
    name: normalizeDisplayName(input.name, profile),
    address: normalizeAddress(input.address, profile)
  };
}
