export * from "./distribution";
export * from "./signalLoop";
