/**
 * Entity enumerations.
 *
 * @module shared/constants/EntityEnums
 */

/**
 * Kinds of entities a population is made of.
 */
export enum EntityType {
  GROUP = "group",
  SITE = "site",
  RESOURCE = "resource",
}

/**
 * Registration state of a group.
 *
 * Groups are created standalone and may be edited freely. Once added to a
 * population they are registered and their attributes and relations can only
 * change through group splitting (or an explicitly forced write).
 */
export enum EntityState {
  STANDALONE = "standalone",
  REGISTERED = "registered",
}
