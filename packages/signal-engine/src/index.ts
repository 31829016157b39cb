export * from "./SignalLifecycleManager";
export * from "./closure";
export * from "./serialization";
