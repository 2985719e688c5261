import { simpleGit, type SimpleGit } from 'simple-git';
import { CommitRef, FileChange, FileContent, SnapshotProvider } from '../types.js';
import { NoParentCommitError } from '../errors.js';

export interface ChangedPath {
  path: string;
  status: FileChange['status'];
}

/**
 * Parse `git diff --name-status -z` output: alternating status and path
 * fields separated by NUL. Renames are disabled upstream, so every entry has
 * exactly one path. Statuses other than A, M and D are dropped.
 */
export function parseNameStatus(output: string): ChangedPath[] {
  const fields = output.split('\0').filter(Boolean);
  const changes: ChangedPath[] = [];

  for (let i = 0; i + 1 < fields.length; i += 2) {
    const status = mapStatusCode(fields[i].charAt(0));
    if (status !== null) {
      changes.push({ path: fields[i + 1], status });
    }
  }

  return changes;
}

function mapStatusCode(code: string): FileChange['status'] | null {
  switch (code) {
    case 'A': return 'added';
    case 'M': return 'modified';
    case 'D': return 'deleted';
    default:
      return null;
  }
}

/**
 * Snapshot access backed by a local git clone. Refs are anything
 * `git rev-parse` accepts; trees are read straight from the object store,
 * so the working tree is never touched.
 */
export class GitRepository implements SnapshotProvider {
  private readonly git: SimpleGit;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(readonly repoPath: string) {
    this.git = simpleGit(repoPath);
  }

  /**
   * Resolve `ref` to a full hash and its first parent.
   * Throws {@link NoParentCommitError} for a root commit.
   */
  async resolveCommit(ref: string): Promise<CommitRef> {
    const output = await this.git.raw(['rev-list', '--parents', '-n', '1', ref]);
    const [hash, parentHash] = output.trim().split(/\s+/);

    if (!parentHash) {
      throw new NoParentCommitError(hash || ref);
    }

    return { hash, parentHash };
  }

  /** Paths in the tree at `ref`, in git tree order. */
  async listFiles(ref: string): Promise<string[]> {
    const output = await this.git.raw(['ls-tree', '-r', '--name-only', '-z', ref]);
    return output.split('\0').filter(Boolean);
  }

  async readFile(ref: string, filePath: string): Promise<FileContent> {
    const data: Buffer = await this.git.binaryCatFile(['-p', `${ref}:${filePath}`]);

    try {
      return { kind: 'text', content: this.decoder.decode(data) };
    } catch {
      // Not valid UTF-8
      return { kind: 'binary' };
    }
  }

  /** Files added, modified or deleted between `parentHash` and `hash`. */
  async listChangedPaths(commit: CommitRef): Promise<ChangedPath[]> {
    const output = await this.git.raw([
      'diff',
      '--name-status',
      '--no-renames',
      '-z',
      commit.parentHash,
      commit.hash,
    ]);
    return parseNameStatus(output);
  }
}
