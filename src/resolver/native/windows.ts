import { z } from "zod";
import { logger } from "../../logger";
import { Result } from "../../type/result";
import type { TimeZoneInformation, WindowsTimeZoneApi } from "../impl/windows";

type Koffi = typeof import("koffi");

const TimeZoneInformationSchema = z.object({
  StandardName: z.instanceof(Uint16Array),
});

type GetTimeZoneInformation = (out: Record<string, unknown>) => unknown;

/**
 * Run a binding step once and replay its outcome, failure included,
 * on every later call
 */
export function bindOnce<T>(bind: () => T): () => T {
  let outcome: Result<T> | null = null;
  return () => {
    if (!outcome) {
      try {
        outcome = Result(bind());
      } catch (error) {
        outcome = Result<T>(error instanceof Error ? error : new Error(String(error)));
      }
    }
    return outcome.unwrap();
  };
}

/**
 * Bind kernel32!GetTimeZoneInformation
 * Reference: https://learn.microsoft.com/en-us/windows/win32/api/timezoneapi/nf-timezoneapi-gettimezoneinformation
 */
const getBinding = bindOnce((): GetTimeZoneInformation => {
  // Loaded lazily so that other platforms never touch the native module
  const koffi: Koffi = require("koffi");

  const SYSTEMTIME = koffi.struct("SYSTEMTIME", {
    wYear: "uint16",
    wMonth: "uint16",
    wDayOfWeek: "uint16",
    wDay: "uint16",
    wHour: "uint16",
    wMinute: "uint16",
    wSecond: "uint16",
    wMilliseconds: "uint16",
  });
  koffi.struct("TIME_ZONE_INFORMATION", {
    Bias: "int32",
    StandardName: koffi.array("uint16", 32, "Typed"),
    StandardDate: SYSTEMTIME,
    StandardBias: "int32",
    DaylightName: koffi.array("uint16", 32, "Typed"),
    DaylightDate: SYSTEMTIME,
    DaylightBias: "int32",
  });

  const kernel32 = koffi.load("kernel32.dll");
  const fn = kernel32.func(
    "uint32 __stdcall GetTimeZoneInformation(_Out_ TIME_ZONE_INFORMATION *lpTimeZoneInformation)"
  );
  return (out) => fn(out);
});

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * WindowsTimeZoneApi backed by the host's Intl implementation and kernel32
 */
export const nativeWindowsApi: WindowsTimeZoneApi = {
  calendarTimeZone() {
    try {
      return Intl.DateTimeFormat().resolvedOptions().timeZone;
    } catch (error) {
      logger.debug("Intl time zone unavailable", { error: describeError(error) });
      return undefined;
    }
  },

  timeZoneInformation(): TimeZoneInformation | undefined {
    try {
      const out: Record<string, unknown> = {};
      const status = z.number().int().safeParse(getBinding()(out));
      const record = TimeZoneInformationSchema.safeParse(out);
      if (!status.success || !record.success) {
        return undefined;
      }
      return { status: status.data, standardName: record.data.StandardName };
    } catch (error) {
      logger.debug("GetTimeZoneInformation unavailable", {
        error: describeError(error),
      });
      return undefined;
    }
  },
};
