/**
 * Pipeline error taxonomy.
 *
 * Every fatal condition aborts the whole run. A mapping gap is not an error:
 * it is reported through the pipeline result.
 */

export type PipelineErrorType =
  | 'DATA_ABSENCE'
  | 'SCHEMA_VIOLATION'
  | 'AGGREGATION_AMBIGUITY'
  | 'CONFIGURATION_ERROR'
  | 'ARTIFACT_WRITE_ERROR';

export abstract class PipelineError extends Error {
  abstract readonly type: PipelineErrorType;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A required temporal filter returned no rows for the report month.
 */
export class DataAbsenceError extends PipelineError {
  readonly type = 'DATA_ABSENCE';

  constructor(
    readonly table: string,
    readonly column: string,
    readonly year: number,
    readonly month: number
  ) {
    super(`No data found in table ${table} for year ${year} and month ${month} in column '${column}'.`);
  }
}

/**
 * A collaborator returned a table that does not match its expected shape.
 */
export class SchemaViolationError extends PipelineError {
  readonly type = 'SCHEMA_VIOLATION';

  constructor(
    readonly table: string,
    readonly column: string,
    readonly detail: string
  ) {
    super(`Schema violation in table ${table}, column '${column}': ${detail}`);
  }
}

/**
 * Rows sharing a tag disagree on a descriptive attribute.
 */
export class AggregationAmbiguityError extends PipelineError {
  readonly type = 'AGGREGATION_AMBIGUITY';

  constructor(
    readonly tag: string,
    readonly attribute: string,
    readonly values: readonly (string | null)[]
  ) {
    super(`Tag '${tag}' has conflicting values for ${attribute}: ${values.map(value => String(value)).join(', ')}`);
  }
}

export class ConfigurationError extends PipelineError {
  readonly type = 'CONFIGURATION_ERROR';

  constructor(readonly setting: string, detail: string) {
    super(`Invalid configuration for ${setting}: ${detail}`);
  }
}

export class ArtifactWriteError extends PipelineError {
  readonly type = 'ARTIFACT_WRITE_ERROR';

  constructor(readonly paths: readonly string[]) {
    super(`All paths failed! Tried: ${paths.join(', ')}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
