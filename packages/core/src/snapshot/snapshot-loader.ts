import { CommitRef, FileChange, SnapshotProvider, SourceFile } from '../types.js';
import { languageOf } from '../parsing/languages.js';
import { GitRepository } from '../git/git-repository.js';

// Bounded so large trees don't spawn thousands of git processes at once
const BATCH_SIZE = 50;

/**
 * Read every analyzable file of the tree at `ref`.
 *
 * Files whose extension maps to no supported language are not read. Files
 * that are not valid UTF-8 are skipped. The result keeps the provider's
 * enumeration order, which decides duplicate-name ties in the index.
 */
export async function loadSnapshot(
  provider: SnapshotProvider,
  ref: string,
): Promise<SourceFile[]> {
  const paths = await provider.listFiles(ref);
  const eligible = paths.flatMap((path) => {
    const language = languageOf(path);
    return language === null ? [] : [{ path, language }];
  });

  const files: SourceFile[] = [];

  for (let i = 0; i < eligible.length; i += BATCH_SIZE) {
    const batch = eligible.slice(i, i + BATCH_SIZE);
    const contents = await Promise.all(
      batch.map((entry) => provider.readFile(ref, entry.path)),
    );

    batch.forEach((entry, j) => {
      const content = contents[j];
      if (content.kind === 'text') {
        files.push({ ...entry, content: content.content });
      }
    });
  }

  return files;
}

/**
 * Before/after contents of every analyzable file the commit added, modified
 * or deleted. A side where the file does not exist reads as empty; a file
 * that is binary on either side is skipped.
 */
export async function loadFileChanges(
  repo: GitRepository,
  commit: CommitRef,
): Promise<FileChange[]> {
  const changes: FileChange[] = [];

  for (const { path, status } of await repo.listChangedPaths(commit)) {
    const language = languageOf(path);
    if (language === null) continue;

    const before = status === 'added'
      ? { kind: 'text' as const, content: '' }
      : await repo.readFile(commit.parentHash, path);
    const after = status === 'deleted'
      ? { kind: 'text' as const, content: '' }
      : await repo.readFile(commit.hash, path);

    if (before.kind === 'binary' || after.kind === 'binary') continue;

    changes.push({
      filePath: path,
      status,
      language,
      contentBefore: before.content,
      contentAfter: after.content,
    });
  }

  return changes;
}
