/**
 * Targets Module
 *
 * Resolves hostnames and keeps the probe engine's addresses in sync with
 * them, for configured (static) and on-demand (ephemeral) targets.
 *
 * IMPORTANT: This module must NOT import from the web framework. Routes
 * call into it; it never calls back into them.
 */

export { DnsTargetResolver, nameserverAddress } from "./resolver.js";
export type { ITargetResolver } from "./resolver.js";
export { Target } from "./target.js";
export { StaticTargetManager } from "./static-target-manager.js";
export type { StaticTargetManagerOptions } from "./static-target-manager.js";
export { EphemeralTargetRegistry } from "./ephemeral-target-registry.js";
export type { EphemeralTargetRegistryOptions } from "./ephemeral-target-registry.js";
