export * from "./file-store";
export * from "./stats-file";
export * from "./config-file";
export * from "./migration";
export * from "./tier-index";
export { hasErrorCode, writeJsonFile } from "./fs-utils";
