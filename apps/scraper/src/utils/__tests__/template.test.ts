import { describe, expect, it } from 'vitest'
import { formatTemplate, templateFields } from '../template.js'
import { TemplateFieldError } from '../../errors.js'

describe('formatTemplate', () => {
  it('substitutes tokens from a record', () => {
    expect(formatTemplate(':group/:user/index', { user: 'joe', group: 'admins' })).toBe('admins/joe/index')
  })

  it('substitutes duplicate tokens independently', () => {
    expect(formatTemplate(':id/:id', { id: 7 })).toBe('7/7')
  })

  it('leaves templates without tokens unchanged', () => {
    expect(formatTemplate('nil-url', {})).toBe('nil-url')
  })

  it('falls back to the camelCase field for hyphenated tokens', () => {
    expect(formatTemplate('pages/:page-no', { pageNo: 3 })).toBe('pages/3')
    expect(formatTemplate('pages/:page-no', { 'page-no': 4, pageNo: 3 })).toBe('pages/4')
  })

  it('accepts a lookup function', () => {
    expect(formatTemplate('users/:user', field => field.toUpperCase())).toBe('users/USER')
  })

  it('keeps non-token text verbatim', () => {
    expect(formatTemplate('a :x b:X %s', { x: 'y' })).toBe('a y b:X %s')
  })

  it('throws on a missing field', () => {
    expect(() => formatTemplate('nil-url/:title', { url: 'http://localhost/' })).toThrow(TemplateFieldError)
    expect(() => formatTemplate('nil-url/:title', { title: null })).toThrow(
      "Template 'nil-url/:title' references missing field 'title'"
    )
  })

  it('ignores inherited properties of the context', () => {
    expect(() => formatTemplate('pages/:constructor', { url: 'x' })).toThrow(TemplateFieldError)
    expect(() => formatTemplate('pages/:to-string', { url: 'x' })).toThrow(
      "Template 'pages/:to-string' references missing field 'to-string'"
    )
  })

  it('treats hyphens as part of the token', () => {
    expect(formatTemplate(':id-', { 'id-': 'a' })).toBe('a')
  })
})

describe('templateFields', () => {
  it('lists fields left to right', () => {
    expect(templateFields(':a/:b-c/:a')).toEqual(['a', 'b-c', 'a'])
  })
})
