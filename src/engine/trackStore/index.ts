export { buildTrajectories, validateTrackSample } from "./buildTrajectories";
export type { TrackStoreResult } from "./buildTrajectories";
export { summarizeTrajectory } from "./summarizeTrajectory";
export type { TrajectorySummary } from "./summarizeTrajectory";
