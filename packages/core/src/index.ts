export * from "./archive/archive-index";
export * from "./capabilities";
export * from "./config/defaults";
export * from "./config/pipeline";
export * from "./db/migrate";
export * from "./db/pool";
export * from "./errors";
export * from "./extractors/labeling";
export * from "./extractors/on-screen-text";
export * from "./extractors/transcript";
export * from "./extractors/types";
export * from "./extractors/visual-description";
export * from "./frames/fingerprint";
export * from "./frames/sample";
export * from "./fusion/fuse";
export * from "./jobs/retry";
export * from "./jobs/state-machine";
export * from "./jobs/store";
export * from "./logger";
export * from "./media/audio";
export * from "./media/probe";
export * from "./metrics/metrics";
export * from "./pipeline/orchestrator";
export * from "./pipeline/url-list";
export * from "./platform/detect";
export * from "./platform/gateway";
export * from "./platform/yt-dlp";
export * from "./process/spawn";
export * from "./repos/archive";
export * from "./repos/jobs";
export * from "./repos/proposed-tags";
export * from "./runtime";
export * from "./taxonomy/proposed-tags";
export * from "./taxonomy/relationships";
export * from "./validation/score";
export { migrationsDir, runMigrations } from "./cli/migrate";
