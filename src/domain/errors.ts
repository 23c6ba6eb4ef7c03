/**
 * Engine error taxonomy.
 * MalformedSampleError is collected per row; EmptyTrajectoryError and ConfigurationError propagate to the caller.
 */

export class ExposureEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A single input row that cannot be used (bad coordinates, negative radius, duplicate key). */
export class MalformedSampleError extends ExposureEngineError {
  readonly rowIndex: number;
  readonly stormId: string | undefined;
  readonly reason: string;

  constructor(params: { rowIndex: number; stormId?: string; reason: string }) {
    const where = params.stormId ? `${params.stormId} row ${params.rowIndex}` : `row ${params.rowIndex}`;
    super(`Malformed track sample (${where}): ${params.reason}`);
    this.rowIndex = params.rowIndex;
    this.stormId = params.stormId;
    this.reason = params.reason;
  }
}

/** A referenced storm has zero valid samples. */
export class EmptyTrajectoryError extends ExposureEngineError {
  readonly stormId: string;

  constructor(stormId: string, detail?: string) {
    super(`Storm ${stormId} has no valid track samples${detail ? ` (${detail})` : ""}`);
    this.stormId = stormId;
  }
}

/** A business parameter is outside its sane range. Never recovered. */
export class ConfigurationError extends ExposureEngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid exposure configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
