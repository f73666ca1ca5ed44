/** Raised when the store document cannot be written; the operation did not happen. */
export class GradebookPersistenceError extends Error {
  constructor(readonly filePath: string, cause: unknown) {
    super(
      `Failed to save gradebook to ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'GradebookPersistenceError';
  }
}

/** Raised when the persisted store file is not a valid gradebook document. */
export class GradebookDocumentError extends Error {
  constructor(readonly filePath: string, reason: string) {
    super(`Invalid gradebook document at ${filePath}: ${reason}`);
    this.name = 'GradebookDocumentError';
  }
}

export class InvalidCourseCreditError extends Error {
  constructor(readonly credit: number) {
    super(`Course credit must be a positive integer, got ${credit}`);
    this.name = 'InvalidCourseCreditError';
  }
}
