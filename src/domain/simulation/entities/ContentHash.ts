import { createHash } from "node:crypto";
import { encode } from "@msgpack/msgpack";
import type { AttrValue } from "@/shared/types/simulation/entities";

/**
 * Content-addressed identity for groups, sites and resources.
 *
 * Two entities are the same entity when their semantic content is the same,
 * regardless of object identity or key insertion order. Content is encoded
 * with MessagePack after sorting keys and digested with SHA-256; the digest
 * is stable across runs and processes.
 *
 * @module domain/simulation/entities/ContentHash
 */

/** Hex characters kept from the SHA-256 digest (64 bits). */
export const HASH_LENGTH = 16;

/**
 * Anything that carries its own content hash.
 */
export interface HashableEntity {
  getHash(): string;
}

export function isHashableEntity(value: unknown): value is HashableEntity {
  return (
    typeof value === "object" &&
    value !== null &&
    "getHash" in value &&
    typeof value.getHash === "function"
  );
}

/**
 * Replaces an entity reference with the entity's own hash. Scalars pass
 * through unchanged. This breaks reference cycles between groups and sites
 * and makes a group holding a site equal to one holding the site's hash.
 */
export function toHashRef(value: AttrValue | HashableEntity): AttrValue {
  return isHashableEntity(value) ? value.getHash() : value;
}

/**
 * Key-sorted entries of a map with entity values replaced by their hashes.
 */
export function canonicalEntries(
  map: Readonly<Record<string, AttrValue | HashableEntity>>,
): [string, AttrValue][] {
  return Object.keys(map)
    .sort()
    .map((key) => [key, toHashRef(map[key])]);
}

/**
 * Digests an arbitrary MessagePack-encodable payload.
 */
export function digest(payload: unknown): string {
  return createHash("sha256")
    .update(encode(payload))
    .digest("hex")
    .slice(0, HASH_LENGTH);
}

/**
 * Hash of a group's content: its attributes and relations.
 */
export function hashContent(
  attr: Readonly<Record<string, AttrValue>>,
  rel: Readonly<Record<string, AttrValue | HashableEntity>>,
): string {
  return digest([canonicalEntries(attr), canonicalEntries(rel)]);
}
