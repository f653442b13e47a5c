// =============================================================================
// @feedsieve/worker: Destination policy for outbound fetches
// =============================================================================
// A feed URL must use http(s). A literal IP in a private, loopback,
// link-local or reserved range is rejected unless it is a loopback literal.
// A hostname is resolved first and rejected when any of its addresses falls
// in those ranges, loopback included.
// =============================================================================

import { lookup } from "node:dns/promises";
import { BlockList, isIP } from "node:net";
import { FetchError, ValidationError, errorMessage } from "@feedsieve/shared";

/** Resolves a hostname to every address it maps to. */
export type HostResolver = (hostname: string) => Promise<string[]>;

export const resolveHost: HostResolver = async (hostname) => {
  const addresses = await lookup(hostname, { all: true, verbatim: true });
  return addresses.map((a) => a.address);
};

const blocked = new BlockList();
// Private
blocked.addSubnet("10.0.0.0", 8, "ipv4");
blocked.addSubnet("172.16.0.0", 12, "ipv4");
blocked.addSubnet("192.168.0.0", 16, "ipv4");
blocked.addSubnet("fc00::", 7, "ipv6");
// Loopback
blocked.addSubnet("127.0.0.0", 8, "ipv4");
blocked.addAddress("::1", "ipv6");
// Link-local unicast and multicast
blocked.addSubnet("169.254.0.0", 16, "ipv4");
blocked.addSubnet("224.0.0.0", 24, "ipv4");
blocked.addSubnet("fe80::", 10, "ipv6");
blocked.addSubnet("ff02::", 16, "ipv6");
// Unspecified ("this network")
blocked.addSubnet("0.0.0.0", 8, "ipv4");
blocked.addAddress("::", "ipv6");

const loopback = new BlockList();
loopback.addSubnet("127.0.0.0", 8, "ipv4");
loopback.addAddress("::1", "ipv6");

const MAPPED_V4 = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

/** Checks `ip` against `list`, unwrapping IPv4-mapped IPv6 addresses. */
function inList(list: BlockList, ip: string): boolean {
  const mapped = MAPPED_V4.exec(ip);
  if (mapped) return list.check(mapped[1], "ipv4");

  switch (isIP(ip)) {
    case 4:
      return list.check(ip, "ipv4");
    case 6:
      return list.check(ip, "ipv6");
    default:
      return false;
  }
}

export function isPrivateAddress(ip: string): boolean {
  return inList(blocked, ip);
}

export function isLoopbackAddress(ip: string): boolean {
  return inList(loopback, ip);
}

/** URL.hostname keeps the brackets around IPv6 literals. */
function bareHostname(url: URL): string {
  const host = url.hostname;
  return host.startsWith("[") && host.endsWith("]") ? host.slice(1, -1) : host;
}

/**
 * Parses `raw` and checks it against the destination policy.
 *
 * @throws ValidationError for a malformed URL, a scheme other than http(s) or
 * a blocked destination; FetchError when the hostname does not resolve.
 */
export async function assertPublicDestination(
  raw: string | URL,
  resolver: HostResolver = resolveHost,
): Promise<URL> {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (err) {
    throw new ValidationError(`invalid feed URL: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValidationError(
      `invalid feed URL: scheme ${url.protocol} is not allowed`,
    );
  }

  const host = bareHostname(url);
  if (host === "") {
    throw new ValidationError("invalid feed URL: missing host");
  }

  if (isIP(host) !== 0) {
    if (isPrivateAddress(host) && !isLoopbackAddress(host)) {
      throw new ValidationError(
        `destination ${host} is a private or reserved address`,
      );
    }
    return url;
  }

  let addresses: string[];
  try {
    addresses = await resolver(host);
  } catch (err) {
    throw new FetchError(`could not resolve ${host}: ${errorMessage(err)}`, undefined, {
      cause: err,
    });
  }

  const denied = addresses.find(isPrivateAddress);
  if (denied !== undefined) {
    throw new ValidationError(
      `destination ${host} resolves to private or reserved address ${denied}`,
    );
  }
  return url;
}
