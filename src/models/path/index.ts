export { splitPath, joinPath, resolvePath, pathExists, listKeysAtPath } from "./navigator";
export type { MatchContext, WildcardMatch, ExpandOptions } from "./expand";
export { WILDCARD, expandWildcards, levelNameFor, countWildcards } from "./expand";
export type { KeySelection } from "./pattern";
export { globToRegExp, matchesPattern, excludeKeys, includeKeys, keyPredicate, selectKeys } from "./pattern";
export type { FlatValue, LeafType, LevelType, StructureNode, TreeOptions } from "./structure";
export {
    flattenObject,
    unflattenObject,
    getNestedKeys,
    getLeafPaths,
    findPathsMatching,
    getStructureSummary,
    inferLevelType,
    printTree,
} from "./structure";
