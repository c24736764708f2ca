// Export core resolver definitions
export * from "./host";
export * from "./registry";
export { ResolverRegistry } from "./registry";
export * from "./types";

// Export resolver implementations (registers them)
export * from "./impl";
