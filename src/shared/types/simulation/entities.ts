import type { Resource } from "@/domain/simulation/entities/Resource";

/**
 * Scalar value an attribute (or a plain relation) can hold.
 */
export type AttrValue = string | number | boolean | null;

/**
 * Group or site attributes.
 */
export type AttrMap = Record<string, AttrValue>;

/**
 * Value of a group relation.
 *
 * Standalone groups may hold entity objects; registered groups hold the
 * content hash of the entity instead.
 */
export type RelValue = AttrValue | Resource;

/**
 * Group relations.
 */
export type RelMap = Record<string, RelValue>;

/**
 * Lookup of registered entities by content hash, plus the optional usage
 * observer active during a monitored run.
 */
export interface EntityResolver {
  resolveEntity(hash: string): Resource | undefined;
  readonly usageObserver: UsageObserver | null;
}

/**
 * Records which attribute and relation names rules condition on.
 */
export interface UsageObserver {
  recordAttr(name: string): void;
  recordRel(name: string): void;
}

/**
 * Registers entities referenced by group relations and returns the
 * registered instance (which may be a previously registered equal entity).
 */
export interface EntityRegistry {
  registerEntity(entity: Resource): Resource;
}
