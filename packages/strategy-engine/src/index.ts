export * from "./ScoringStrategy";
export * from "./scoring";
export * from "./protectiveLevels";
export * from "./cooldown";
