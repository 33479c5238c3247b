// api/src/lib/errors.ts

export class RangeCheckError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** One or more required sheets (Room Data, Min, Max) could not be identified. */
export class MissingRoleError extends RangeCheckError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`The following required sheets are missing: ${missing.join(', ')}`);
    this.missing = missing;
  }
}

export class WorkbookFormatError extends RangeCheckError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export const isRangeCheckError = (err: unknown): err is RangeCheckError => err instanceof RangeCheckError;
