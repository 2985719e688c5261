import {
  CallAnalysisComparison,
  FunctionCallAnalysis,
  FunctionDefinition,
} from '../types.js';

interface SetDiff<T> {
  added: T[];
  removed: T[];
  unchanged: T[];
}

/**
 * Partition two lists by name. When a name occurs more than once on one
 * side, the last occurrence represents it. Unchanged entries are taken from
 * the `after` side.
 */
function diffByName<T extends FunctionDefinition>(before: T[], after: T[]): SetDiff<T> {
  const beforeByName = new Map(before.map((item): [string, T] => [item.name, item]));
  const afterByName = new Map(after.map((item): [string, T] => [item.name, item]));

  const added: T[] = [];
  const unchanged: T[] = [];
  for (const [name, item] of afterByName) {
    (beforeByName.has(name) ? unchanged : added).push(item);
  }

  const removed: T[] = [];
  for (const [name, item] of beforeByName) {
    if (!afterByName.has(name)) {
      removed.push(item);
    }
  }

  return { added, removed, unchanged };
}

/**
 * Compare the call graph of one function before and after a change.
 * This is a set operation on names only; call counts and positions are not
 * compared.
 */
export function compareCallAnalysis(
  before: FunctionCallAnalysis,
  after: FunctionCallAnalysis,
): CallAnalysisComparison {
  const callees = diffByName(before.callees, after.callees);
  const callers = diffByName(before.callers, after.callers);

  return {
    addedCallees: callees.added,
    removedCallees: callees.removed,
    unchangedCallees: callees.unchanged,
    addedCallers: callers.added,
    removedCallers: callers.removed,
    unchangedCallers: callers.unchanged,
  };
}
