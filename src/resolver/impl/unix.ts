import { logger } from "../../logger";
import { parseTimeZone, unquote } from "../../utils/timezone";
import { nodeHost, type HostAccess } from "../host";
import { PlatformFamily, type TimeZoneResolver } from "../types";

const ZONEINFO_MARKER = "/zoneinfo/";

/**
 * One place a timezone name may be found
 */
export interface UnixSource {
  /** Shown in debug logs */
  label: string;
  read(host: HostAccess): string | undefined;
}

/**
 * Name after the first "/zoneinfo/" of a symlink's canonical target
 */
export function zoneFromLink(path: string): UnixSource {
  return {
    label: `${path} -> zoneinfo`,
    read(host) {
      const target = host.realPath(path);
      if (target === undefined) {
        return undefined;
      }
      const index = target.indexOf(ZONEINFO_MARKER);
      return index === -1 ? undefined : target.slice(index + ZONEINFO_MARKER.length);
    },
  };
}

/**
 * Value of the first KEY=value line whose key starts with one of the prefixes
 *
 * Only the first matching line is considered, even if its value turns out
 * to be unusable.
 */
export function zoneFromKeyFile(path: string, prefixes: readonly string[]): UnixSource {
  return {
    label: `${path} [${prefixes.join("|")}]`,
    read(host) {
      const content = host.readTextFile(path);
      if (content === undefined) {
        return undefined;
      }
      const line = content.split(/\r?\n/).find((candidate) => {
        const trimmed = candidate.trimStart();
        return prefixes.some((prefix) => trimmed.startsWith(prefix));
      });
      if (line === undefined) {
        return undefined;
      }
      const separator = line.indexOf("=");
      return separator === -1 ? undefined : unquote(line.slice(separator + 1));
    },
  };
}

export function zoneFromFile(path: string): UnixSource {
  return { label: path, read: (host) => host.readTextFile(path) };
}

export function zoneFromEnv(name: string): UnixSource {
  return { label: `$${name}`, read: (host) => host.env(name) };
}

/**
 * Probing order; the first source yielding a valid zone wins
 *
 * References:
 * - https://man7.org/linux/man-pages/man5/localtime.5.html
 * - https://man7.org/linux/man-pages/man1/timedatectl.1.html
 */
export const UNIX_SOURCES: readonly UnixSource[] = [
  zoneFromEnv("TZ"),
  // Debian and derivatives
  zoneFromFile("/etc/timezone"),
  // BSD
  zoneFromFile("/var/db/zoneinfo"),
  zoneFromLink("/etc/localtime"),
  zoneFromLink("/usr/local/etc/localtime"),
  // CentOS and OpenSUSE
  zoneFromKeyFile("/etc/sysconfig/clock", ["ZONE", "TIMEZONE"]),
  // Gentoo
  zoneFromKeyFile("/etc/conf.d/clock", ["TIMEZONE"]),
  zoneFromKeyFile("/etc/default/init", ["TZ"]),
  zoneFromKeyFile("/usr/local/etc/default/init", ["TZ"]),
];

/**
 * Unix (Linux, macOS, BSD) resolver
 */
export class UnixResolver implements TimeZoneResolver {
  readonly family = PlatformFamily.Unix;

  constructor(
    private readonly host: HostAccess = nodeHost,
    private readonly sources: readonly UnixSource[] = UNIX_SOURCES
  ) {}

  resolve(): string | undefined {
    for (const source of this.sources) {
      const candidate = source.read(this.host);
      if (candidate === undefined) {
        continue;
      }

      const zone = parseTimeZone(candidate);
      if (zone) {
        logger.debug("Timezone resolved", { source: source.label, zone });
        return zone;
      }
      logger.debug("Skipping unparsable timezone candidate", {
        source: source.label,
        candidate: candidate.trim(),
      });
    }
    return undefined;
  }
}
