import * as cheerio from 'cheerio'
import type { Cheerio } from 'cheerio'
import type { AnyNode } from 'domhandler'
import type { Context } from '../types.js'

/**
 * Default parse function: load the body into a cheerio document.
 */
export function loadHtml(body: string, _context?: Context): cheerio.CheerioAPI {
  return cheerio.load(body)
}

export function isCheerioDocument(value: unknown): value is cheerio.CheerioAPI {
  return typeof value === 'function' && 'html' in value && typeof value.html === 'function' && 'root' in value
}

export function firstText($: cheerio.CheerioAPI, selector: string): string {
  return $(selector).first().text().trim()
}

export function firstAttr(
  $: cheerio.CheerioAPI,
  selector: string,
  attr: string
): string | undefined {
  const value = $(selector).first().attr(attr)?.trim()
  return value || undefined
}

/**
 * Link target of a selection: its own href when the first element is an
 * anchor, otherwise the href of the first anchor inside it.
 */
export function href<T extends AnyNode>(selection: Cheerio<T> | undefined): string | undefined {
  if (!selection || selection.length === 0) {
    return undefined
  }
  const first = selection.first()
  const link = first.is('a') ? first.attr('href') : first.find('a').first().attr('href')
  const value = link?.trim()
  return value || undefined
}
