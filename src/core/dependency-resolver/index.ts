/**
 * Dependency resolver
 *
 * - types.ts: plan node and work-item types
 * - resolver.ts: iterative pre-order resolver
 */

export type { ResolutionNode, DependencyResolverOptions } from './types.js';
export { DependencyResolver } from './resolver.js';
