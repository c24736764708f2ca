import { PlatformFamily, type ResolverFactory, type TimeZoneResolver } from "./types";

/**
 * Resolver registry for managing resolver factories
 *
 * Each PlatformFamily registers one factory. The resolver for the host's
 * family is created on first use and reused afterwards, since the
 * platform cannot change during the life of the process.
 */
class ResolverRegistryImpl {
  private factories = new Map<PlatformFamily, ResolverFactory>();
  private instances = new Map<PlatformFamily, TimeZoneResolver>();

  /**
   * Register a resolver factory for a platform family
   * Replaces any factory and cached instance previously registered for it.
   */
  register(family: PlatformFamily, factory: ResolverFactory): void {
    this.factories.set(family, factory);
    this.instances.delete(family);
  }

  /**
   * Get the resolver for a platform family, creating it on first use
   * @throws Error if no factory is registered for the family
   */
  get(family: PlatformFamily): TimeZoneResolver {
    const existing = this.instances.get(family);
    if (existing) {
      return existing;
    }

    const factory = this.factories.get(family);
    if (!factory) {
      throw new Error(
        `Platform family "${family}" is not registered. Available families: ${Array.from(
          this.factories.keys()
        ).join(", ")}`
      );
    }

    const resolver = factory();
    this.instances.set(family, resolver);
    return resolver;
  }

  /**
   * Check if a platform family is registered
   */
  isRegistered(family: PlatformFamily): boolean {
    return this.factories.has(family);
  }

  /**
   * Get all registered platform families
   */
  getRegisteredFamilies(): PlatformFamily[] {
    return Array.from(this.factories.keys());
  }
}

/**
 * Global resolver registry instance
 */
export const ResolverRegistry = new ResolverRegistryImpl();

/**
 * Map a Node.js platform name to its family
 * @param platform process.platform, or null outside Node.js
 */
export function detectPlatformFamily(
  platform: string | null = globalThis.process?.platform ?? null
): PlatformFamily {
  if (platform === null) {
    return PlatformFamily.Web;
  }
  return platform === "win32" ? PlatformFamily.Windows : PlatformFamily.Unix;
}
