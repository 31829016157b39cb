export * from "./signalPerformance";
