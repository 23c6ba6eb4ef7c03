export { runExposurePipeline } from "./runExposurePipeline";
export type { ExposurePipelineInput, ExposurePipelineResult } from "./runExposurePipeline";
export { prepareAirports } from "./prepareAirports";
export type { PreparedAirports } from "./prepareAirports";
