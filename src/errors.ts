/* eslint-disable max-classes-per-file */ // This file defines the error taxonomy

/**
 * Base class for every error raised while building a catalog. The code is stable and ends
 * up in run reports.
 */
export class CatalogError extends Error {
  code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Per-source errors: the source is skipped and reported

export class UnreadableSourceError extends CatalogError {
  ref: string;

  constructor(ref: string, reason: string, options?: ErrorOptions) {
    super('UnreadableSource', `Could not read source ${ref}: ${reason}`, options);
    this.ref = ref;
  }
}

export class UnsupportedCrsError extends CatalogError {
  crs: string;

  constructor(crs: string, ref?: string) {
    super('UnsupportedCrs', `Unsupported CRS "${crs}"${ref ? ` in source ${ref}` : ''}`);
    this.crs = crs;
  }
}

export class SourceTimeoutError extends CatalogError {
  ref: string;

  constructor(ref: string, timeoutMs: number) {
    super('SourceTimeout', `Source ${ref} was not processed within ${timeoutMs}ms`);
    this.ref = ref;
  }
}

// Per-group errors: the item or collection is left out and reported

export class EmptyGroupError extends CatalogError {
  groupKey: string;

  constructor(groupKey: string, detail = 'no assets') {
    super('EmptyGroup', `Group ${groupKey} resolved to ${detail}`);
    this.groupKey = groupKey;
  }
}

export class DuplicateItemIdError extends CatalogError {
  collectionId: string;

  itemId: string;

  constructor(collectionId: string, itemId: string) {
    super('DuplicateItemId', `Item id ${itemId} occurs more than once in collection ${collectionId}`);
    this.collectionId = collectionId;
    this.itemId = itemId;
  }
}

// Fatal errors: the write is aborted and nothing is persisted

export interface LinkViolation {
  source: string;
  rel: string;
  target: string;
  problem: string;
}

export class BrokenLinkGraphError extends CatalogError {
  violations: LinkViolation[];

  constructor(violations: LinkViolation[]) {
    const shown = violations
      .slice(0, 10)
      .map((v) => `${v.source} -[${v.rel}]-> ${v.target}: ${v.problem}`)
      .join('; ');
    const more = violations.length > 10 ? ` (and ${violations.length - 10} more)` : '';
    super('BrokenLinkGraph', `Catalog link graph is broken: ${shown}${more}`);
    this.violations = violations;
  }
}

export class CatalogLockedError extends CatalogError {
  constructor(target: string) {
    super('CatalogLocked', `Another writer holds the lock on ${target}`);
  }
}

export class RunCancelledError extends CatalogError {
  constructor() {
    super('RunCancelled', 'The run was cancelled before the catalog was written');
  }
}

/**
 * A recoverable problem attached to the run report
 */
export interface RunWarning {
  code: string;
  /** The source file, group key or collection the warning is about */
  ref: string;
  message: string;
}

/**
 * Converts an error raised by per-source or per-group work into a report entry.
 *
 * @param error - what was thrown
 * @param ref - the source, group or collection being processed
 * @returns the warning
 */
export function toWarning(error: unknown, ref: string): RunWarning {
  if (error instanceof CatalogError) {
    return { code: error.code, ref, message: error.message };
  }
  return {
    code: 'UnexpectedError',
    ref,
    message: error instanceof Error ? error.message : String(error),
  };
}
