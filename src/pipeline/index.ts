export * from "./certPipeline";
export * from "./certState";
export * from "./resultAggregator";
