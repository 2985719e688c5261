import { CallInfo, DefinitionIndex, FunctionCallAnalysis } from '../types.js';

/**
 * Compute callees and callers for each target name against one snapshot.
 *
 * Calls are resolved by bare name against the index, so a call is only
 * reported when some function of that name is defined in the snapshot.
 * Targets with no definition are left out of the result.
 *
 * Two passes:
 *   1. Seed an analysis for every target found in the index.
 *   2. Walk every scanned function. A target's own call set becomes its
 *      callees; any function whose call set names a target is recorded as
 *      one of that target's callers (one entry per calling function, so a
 *      recursive target lists itself on both sides).
 */
export function resolveCallGraph(
  targetNames: Iterable<string>,
  index: DefinitionIndex,
): Map<string, FunctionCallAnalysis> {
  const results = new Map<string, FunctionCallAnalysis>();

  // --- 1. Seed -------------------------------------------------------------
  for (const name of targetNames) {
    const definition = index.definitions.get(name);
    if (!definition || results.has(name)) continue;

    results.set(name, {
      functionName: name,
      filePath: definition.filePath,
      signature: definition.signature,
      returnType: definition.returnType,
      callees: [],
      callers: [],
    });
  }

  if (results.size === 0) {
    return results;
  }

  // --- 2. Resolve edges ----------------------------------------------------
  for (const { definition, calls } of index.scanned) {
    const own = results.get(definition.name);
    if (own) {
      for (const call of calls) {
        const callee = index.definitions.get(call);
        if (callee) {
          own.callees.push(callee);
        }
      }
    }

    for (const call of calls) {
      const target = results.get(call);
      if (!target) continue;

      const caller: CallInfo = {
        ...definition,
        callee: call,
        callLine: definition.startLine,
      };
      target.callers.push(caller);
    }
  }

  return results;
}
