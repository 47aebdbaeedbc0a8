export * from "./errors";
export * from "./football/poisson";
export * from "./football/scoreMatrix";
export * from "./football/ranker";
export * from "./odds/implied";
export * from "./odds/margin";
export * from "./predict";
