/**
 * Operating system families with a dedicated resolution strategy
 */
export enum PlatformFamily {
  Unix = "unix",
  Windows = "windows",
  Web = "web",
}

/**
 * TimeZoneResolver interface
 * One implementation per platform family
 *
 * Design principles:
 * - Best effort: every failure collapses to undefined, nothing is thrown
 * - Stateless: each call probes the host again, nothing is cached
 * - Read-only: only the environment, files and native APIs are queried
 */
export interface TimeZoneResolver {
  readonly family: PlatformFamily;

  /**
   * Try to determine the host's timezone
   * @returns IANA identifier, or undefined if no source yielded one
   */
  resolve(): string | undefined;
}

/**
 * Resolver factory function type
 */
export type ResolverFactory = () => TimeZoneResolver;
