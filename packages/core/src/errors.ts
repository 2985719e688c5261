/**
 * Raised when a commit has no parent, so there is nothing to diff against.
 */
export class NoParentCommitError extends Error {
  constructor(readonly commit: string) {
    super(`Commit ${commit} has no parent; cannot compute diff`);
    this.name = 'NoParentCommitError';
  }
}

