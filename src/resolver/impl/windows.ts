import { getWindowsZones, type WindowsZones } from "../../dataset/windows-zones";
import { logger } from "../../logger";
import { parseTimeZone } from "../../utils/timezone";
import { nativeWindowsApi } from "../native/windows";
import { PlatformFamily, type TimeZoneResolver } from "../types";

/**
 * Status codes of GetTimeZoneInformation that carry a usable record:
 * TIME_ZONE_ID_UNKNOWN, TIME_ZONE_ID_STANDARD and TIME_ZONE_ID_DAYLIGHT
 */
const VALID_STATUSES: ReadonlySet<number> = new Set([0, 1, 2]);

/**
 * Subset of TIME_ZONE_INFORMATION the resolver reads
 */
export interface TimeZoneInformation {
  status: number;
  /** WCHAR[32], NUL-terminated within the buffer */
  standardName: Uint16Array;
}

/**
 * Native Windows timezone queries
 * Implementations return undefined instead of throwing.
 */
export interface WindowsTimeZoneApi {
  /** Time zone reported by the locale/calendar layer */
  calendarTimeZone(): string | undefined;
  /** Raw GetTimeZoneInformation result */
  timeZoneInformation(): TimeZoneInformation | undefined;
}

/**
 * Decode a UTF-16 buffer up to its first NUL, replacing invalid sequences
 */
export function decodeUtf16(buffer: Uint16Array): string {
  const end = buffer.indexOf(0);
  const units = end === -1 ? buffer : buffer.subarray(0, end);
  const bytes = new Uint8Array(units.length * 2);
  units.forEach((unit, index) => {
    bytes[index * 2] = unit & 0xff;
    bytes[index * 2 + 1] = unit >> 8;
  });
  return new TextDecoder("utf-16le").decode(bytes);
}

/**
 * Microsoft Windows resolver
 *
 * Windows names its zones after registry keys ("Romance Standard Time"),
 * so the native name is translated through the CLDR WindowsZones dataset.
 */
export class WindowsResolver implements TimeZoneResolver {
  readonly family = PlatformFamily.Windows;

  constructor(
    private readonly api: WindowsTimeZoneApi = nativeWindowsApi,
    private readonly zones: () => WindowsZones = getWindowsZones
  ) {}

  resolve(): string | undefined {
    const calendarZone = this.api.calendarTimeZone();
    if (calendarZone !== undefined) {
      const zone = parseTimeZone(calendarZone);
      if (zone) {
        return zone;
      }
      logger.debug("Skipping unparsable calendar timezone", {
        candidate: calendarZone,
      });
    }

    return this.fromTimeZoneInformation();
  }

  private fromTimeZoneInformation(): string | undefined {
    const info = this.api.timeZoneInformation();
    if (!info || !VALID_STATUSES.has(info.status)) {
      logger.debug("GetTimeZoneInformation failed", { status: info?.status });
      return undefined;
    }

    const standardName = decodeUtf16(info.standardName);

    let dataset: WindowsZones;
    try {
      dataset = this.zones();
    } catch (error) {
      logger.warn("Windows zones dataset not available, run `npm run dataset`", {
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const record = dataset.get(standardName);
    if (!record) {
      logger.debug("Unknown Windows timezone", { standardName });
      return undefined;
    }
    return dataset.toIana(record);
  }
}
