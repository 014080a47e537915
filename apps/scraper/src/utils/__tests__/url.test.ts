import { describe, expect, it } from 'vitest'
import { isValidUrl, mergeUrls } from '../url.js'

describe('mergeUrls', () => {
  const base = 'https://foo.pl/bar/baz'

  it.each([
    ['http://bar.uk/baz/foo', 'http://bar.uk/baz/foo'],
    ['//bar.uk/baz/foo', 'https://bar.uk/baz/foo'],
    ['/baz/foo', 'https://foo.pl/baz/foo'],
    ['foo', 'https://foo.pl/bar/foo'],
  ])('resolves %s', (link, expected) => {
    expect(mergeUrls(base, link)).toBe(expected)
  })

  it('keeps query strings from the link', () => {
    expect(mergeUrls(base, '?page=2')).toBe('https://foo.pl/bar/baz?page=2')
  })
})

describe('isValidUrl', () => {
  it('accepts http and https', () => {
    expect(isValidUrl('http://localhost/0')).toBe(true)
    expect(isValidUrl('https://foo.pl')).toBe(true)
  })

  it('rejects other protocols and garbage', () => {
    expect(isValidUrl('ftp://foo.pl')).toBe(false)
    expect(isValidUrl('not a url')).toBe(false)
  })
})
