/**
 * Errors raised while building a road graph.
 *
 * Every error carries the HTTP status the server answers with. None of them
 * is retried inside the builder.
 */

import type { EdgeId } from "@roadnet/types";

export abstract class GraphBuildError extends Error {
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The requested schema vintage has no registered adapter */
export class UnsupportedVintageError extends GraphBuildError {
  readonly status = 400;

  constructor(
    readonly vintage: string,
    readonly supported: readonly string[]
  ) {
    super(
      `vintage ${vintage} not supported; must be one of ${supported.map((v) => `'${v}'`).join(", ")}`
    );
  }
}

/** A raw record does not have the shape its vintage requires */
export class SchemaError extends GraphBuildError {
  readonly status = 422;

  constructor(
    readonly recordIndex: number,
    readonly field: string,
    detail: string
  ) {
    super(`record ${recordIndex}: field "${field}" ${detail}`);
  }
}

/** Nothing usable to build from */
export class EmptyInputError extends GraphBuildError {
  readonly status = 422;
}

/** The graph has no strongly connected part with any edge in it */
export class NotRoutableError extends GraphBuildError {
  readonly status = 422;
}

/** Two edges share `(from, to, key)` and the build asked to fail on it */
export class DuplicateEdgeKeyError extends GraphBuildError {
  readonly status = 409;

  constructor(readonly edgeId: EdgeId) {
    super(`duplicate edge ${edgeId}; road ids are not unique`);
  }
}
