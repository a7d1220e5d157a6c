export * from "./featureFlags";
export * as observability from "./observability";
export * from "./typeGuards";
export * from "./ui/motion";
