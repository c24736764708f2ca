import { parseTimeZone } from "../../utils/timezone";
import { PlatformFamily, type TimeZoneResolver } from "../types";

/**
 * Fields of Intl.DateTimeFormat#resolvedOptions() that may hold a zone name
 */
export interface ResolvedZoneOptions {
  timeZoneName?: unknown;
  timeZone?: unknown;
}

export type ResolvedOptionsProvider = () => ResolvedZoneOptions;

const intlResolvedOptions: ResolvedOptionsProvider = () =>
  Intl.DateTimeFormat().resolvedOptions();

function asZone(value: unknown): string | undefined {
  return typeof value === "string" ? parseTimeZone(value) : undefined;
}

/**
 * Browser and sandboxed runtimes, where the host only exposes Intl
 * Reference: https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Intl/DateTimeFormat/resolvedOptions
 */
export class WebResolver implements TimeZoneResolver {
  readonly family = PlatformFamily.Web;

  constructor(private readonly options: ResolvedOptionsProvider = intlResolvedOptions) {}

  resolve(): string | undefined {
    let resolved: ResolvedZoneOptions;
    try {
      resolved = this.options();
    } catch {
      return undefined;
    }
    return asZone(resolved.timeZoneName) ?? asZone(resolved.timeZone);
  }
}
