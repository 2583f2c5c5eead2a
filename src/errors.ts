/**
 * Fatal pipeline conditions. Each carries the field that failed and the value
 * that was measured or read, so the session can report which stage broke.
 */
export class PipelineError extends Error {
  constructor(
    readonly field: string,
    readonly value: unknown,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { name: string; field: string; value: unknown; message: string } {
    return { name: this.name, field: this.field, value: this.value, message: this.message };
  }
}

/** A boundary scan failed validation and no fallback cut was stored. */
export class MeasurementError extends PipelineError {}

/** A required field could not be extracted from its crop. */
export class ExtractionError extends PipelineError {}

/** A star string broke the old → new → none order. */
export class ScoreOrderError extends PipelineError {}

/** Every rank slot of the roster is taken. */
export class RosterCapacityError extends PipelineError {}
