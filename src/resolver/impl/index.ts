export * from "./unix";
export * from "./web";
export * from "./windows";

import { ResolverRegistry } from "../registry";
import { PlatformFamily } from "../types";
import { UnixResolver } from "./unix";
import { WebResolver } from "./web";
import { WindowsResolver } from "./windows";

ResolverRegistry.register(PlatformFamily.Unix, () => new UnixResolver());
ResolverRegistry.register(PlatformFamily.Windows, () => new WindowsResolver());
ResolverRegistry.register(PlatformFamily.Web, () => new WebResolver());
