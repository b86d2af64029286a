export * from "./logger";
export * from "./static";
export * from "./templates";
