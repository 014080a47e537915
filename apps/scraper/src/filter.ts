/**
 * Context filtering and post-processing, applied with the same call
 * options at every recursion depth.
 */

import { isDeepStrictEqual } from 'node:util'
import type { Context, ContextFilter, ContextPattern, ContextPredicate, StageOptions } from './types.js'

/**
 * True if every field present in both maps has equal values. Maps with
 * no fields in common always agree.
 */
export function allows(pattern: ContextPattern, context: Context): boolean {
  for (const field of Object.keys(pattern)) {
    if (!Object.hasOwn(context, field)) {
      continue
    }
    if (!isDeepStrictEqual(pattern[field], context[field])) {
      return false
    }
  }
  return true
}

function isPredicate(filter: ContextFilter): filter is ContextPredicate {
  return typeof filter === 'function'
}

function isPatternList(filter: ContextFilter): filter is readonly ContextPattern[] {
  return Array.isArray(filter)
}

/**
 * Turn an `only` option into a predicate. A pattern list keeps contexts
 * compatible with at least one pattern.
 */
export function toPredicate(only: ContextFilter): ContextPredicate {
  if (isPredicate(only)) {
    return only
  }
  const patterns: readonly ContextPattern[] = isPatternList(only) ? only : [only]
  return context => patterns.some(pattern => allows(pattern, context))
}

export function filterContexts(contexts: Context[], options: Pick<StageOptions, 'only'>): Context[] {
  if (!options.only) {
    return contexts
  }
  return contexts.filter(toPredicate(options.only))
}

export function postprocessContexts(
  contexts: Context[],
  options: Pick<StageOptions, 'postprocess'>
): Context[] {
  if (!options.postprocess) {
    return contexts
  }
  return options.postprocess(contexts)
}
