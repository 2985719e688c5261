import { DefinitionIndex, FunctionDefinition, ScannedFunction, SourceFile } from '../types.js';
import { GrammarRegistry } from '../parsing/grammar-registry.js';
import { scanFunctions } from '../parsing/source-parser.js';

/**
 * Build the name -> definition index for one snapshot.
 *
 * Files are scanned in the order given. When several functions share a
 * name, the one scanned last is kept, so the winner depends on the file
 * enumeration order of the snapshot (git tree order for
 * {@link GitRepository}). Every scanned function is also kept, with its
 * call set, so the resolver does not have to parse the snapshot again.
 */
export function buildDefinitionIndex(
  files: SourceFile[],
  registry: GrammarRegistry,
): DefinitionIndex {
  const definitions = new Map<string, FunctionDefinition>();
  const scanned: ScannedFunction[] = [];

  for (const file of files) {
    for (const fn of scanFunctions(registry, file.content, file.language, file.path)) {
      definitions.set(fn.definition.name, fn.definition);
      scanned.push(fn);
    }
  }

  return { definitions, scanned };
}
