export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./summarizer";
export * from "./classifier";
export * from "./tier-selection";
export * from "./retrieval";
export * from "./stats";
export * from "./memory-store";
export * from "./engine";
