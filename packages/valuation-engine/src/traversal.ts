import { TreeStructureError } from './errors'

/**
 * Nodes of a tree ordered so that every node comes after all of its
 * descendants. Uses an explicit stack, so depth is bounded by memory rather
 * than the call stack.
 *
 * Throws if a node object is reachable twice, which would otherwise loop
 * forever on a cyclic input.
 */
export function postOrder<T extends object>(
  root: T,
  childrenOf: (node: T) => readonly T[],
  nameOf: (node: T) => string,
): T[] {
  const seen = new Set<T>()
  const preorder: T[] = []
  const stack: T[] = [root]

  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    if (seen.has(node)) {
      throw new TreeStructureError(nameOf(node), 'node appears more than once in the tree')
    }
    seen.add(node)
    preorder.push(node)
    for (const child of childrenOf(node)) stack.push(child)
  }

  return preorder.reverse()
}
