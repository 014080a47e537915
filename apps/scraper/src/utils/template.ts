/**
 * Cache-key micro-templating.
 *
 * A template holds tokens of a colon followed by lowercase letters and
 * hyphens (`:category/:page-no`). Each token names a context field; the
 * token is replaced by the field's value and all other text is kept.
 *
 * ```ts
 * formatTemplate(':group/:user/index', { user: 'joe', group: 'admins' })
 * // => 'admins/joe/index'
 * ```
 */

import { TemplateFieldError } from '../errors.js'

const TOKEN_PATTERN = /:[a-z-]+/g

export type TemplateLookup = Record<string, unknown> | ((field: string) => unknown)

function toCamelCase(field: string): string {
  return field.replace(/-([a-z])/g, (_match, letter: string) => letter.toUpperCase())
}

function lookupField(lookup: TemplateLookup, field: string): unknown {
  // `:page-no` matches a `page-no` field first, then `pageNo`
  for (const candidate of new Set([field, toCamelCase(field)])) {
    if (typeof lookup !== 'function' && !Object.hasOwn(lookup, candidate)) {
      continue
    }
    const value = typeof lookup === 'function' ? lookup(candidate) : lookup[candidate]
    if (value !== undefined && value !== null) {
      return value
    }
  }
  return undefined
}

/**
 * Field names referenced by a template, left to right, duplicates kept.
 */
export function templateFields(template: string): string[] {
  return Array.from(template.matchAll(TOKEN_PATTERN), match => match[0].slice(1))
}

/**
 * Fill a template from a record or a lookup function.
 * @throws TemplateFieldError when a referenced field is missing or null
 */
export function formatTemplate(template: string, lookup: TemplateLookup): string {
  return template.replace(TOKEN_PATTERN, token => {
    const field = token.slice(1)
    const value = lookupField(lookup, field)
    if (value === undefined) {
      throw new TemplateFieldError(field, template)
    }
    return String(value)
  })
}
