export * from "./ContentHash";
export { Resource } from "./Resource";
export { Site } from "./Site";
export { Group } from "./Group";
export type { GroupOwner, GroupSplitOptions, ReadonlyGroup } from "./Group";
export { GroupQuery } from "./GroupQuery";
export type { GroupPredicate, GroupQueryOptions, QueryCondition } from "./GroupQuery";
export { GroupSplitSpec } from "./GroupSplitSpec";
export type { GroupSplitSpecOptions } from "./GroupSplitSpec";
