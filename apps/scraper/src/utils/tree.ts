/**
 * Compressed path trees for building seeds.
 *
 * Leading scalar items form a path segment shared by every nested array
 * after them:
 *
 * ```ts
 * uncompressTree(['shop', ['books', ['new'], ['used']], ['music']])
 * // => [['shop', 'books', 'new'], ['shop', 'books', 'used'], ['shop', 'music']]
 * ```
 */

export type CompressedTree<T> = ReadonlyArray<T | CompressedTree<T>>

function isSubtree<T>(item: T | CompressedTree<T>): item is CompressedTree<T> {
  return Array.isArray(item)
}

export function uncompressTree<T>(tree: CompressedTree<T>, path: readonly T[] = []): T[][] {
  const firstSubtree = tree.findIndex(item => isSubtree(item))
  const head = firstSubtree === -1 ? tree : tree.slice(0, firstSubtree)
  const rest = firstSubtree === -1 ? [] : tree.slice(firstSubtree)

  const nextPath = [...path]
  for (const item of head) {
    if (!isSubtree(item)) {
      nextPath.push(item)
    }
  }

  if (rest.length === 0) {
    return [nextPath]
  }

  return rest.flatMap(item => {
    if (!isSubtree(item)) {
      throw new Error('Compressed tree items after the first subtree must be subtrees')
    }
    return uncompressTree(item, nextPath)
  })
}
