export * from "./binanceClient";
export * from "./ccxtMapper";
export * from "./retry";
export * from "./symbols";
