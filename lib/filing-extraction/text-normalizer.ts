/**
 * @fileoverview Filing markup to plain text
 *
 * Filings arrive as HTML (most proxy statements and annual reports) or as
 * XML (structured submissions). Both are loaded with cheerio; the mode is
 * picked from the document prologue. Input without any tags is treated as
 * text already. Escaped tags in the source (`&lt;b&gt;`) decode to text that
 * would read as a tag, so their `<` is escaped again on output; together
 * these make toPlainText idempotent. Paragraph boundaries
 * survive as single newlines because the biography segmenter splits on them.
 *
 * @module lib/filing-extraction/text-normalizer
 */

import * as cheerio from "cheerio"
import type { CheerioAPI } from "cheerio"
import { ParseError } from "@/lib/errors"
import { Err, Ok, trySync, unwrap, type Result } from "@/lib/result"
import type { NormalizedText, Table } from "./types"

// ============================================================================
// Element Classes
// ============================================================================

/** Removed entirely before text extraction */
const NON_CONTENT_SELECTOR = "script, style, noscript, template"

/** Elements whose boundaries are paragraph breaks */
const BLOCK_SELECTOR = [
  "html",
  "body",
  "title",
  "p",
  "div",
  "section",
  "article",
  "header",
  "footer",
  "center",
  "blockquote",
  "pre",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "ul",
  "ol",
  "li",
  "dl",
  "dt",
  "dd",
  "table",
  "tr",
  "hr",
].join(", ")

/** Table cells are separated by a space, not a break */
const CELL_SELECTOR = "td, th"

/** Guard against absurd colspan values in malformed tables */
const MAX_COLSPAN = 50

/**
 * Private-use placeholder for paragraph breaks. Source newlines inside
 * markup are insignificant and get collapsed; this survives the collapse.
 */
const BREAK = "\uE000"

// ============================================================================
// Loading
// ============================================================================

type MarkupKind = "xml" | "html"

/**
 * Detects whether content is XML or HTML.
 * XML filings start with a declaration or the archive's `<XML>` wrapper.
 */
export function detectMarkupKind(content: string): MarkupKind {
  const stripped = content.trimStart()
  if (stripped.startsWith("<?xml") || stripped.startsWith("<XML>")) {
    return "xml"
  }
  return "html"
}

function isBinary(content: string): boolean {
  return content.includes("\u0000") || content.trimStart().startsWith("%PDF-")
}

/** Plain text (including our own output) has no tags, comments or declarations */
function looksLikeMarkup(content: string): boolean {
  return /<[A-Za-z!?/]/.test(content)
}

/** Keeps decoded text from reading as markup on the next pass */
function escapeTagOpeners(text: string): string {
  return text.replace(/<(?=[A-Za-z!?/])/g, "&lt;")
}

function checkReadable(markup: string): ParseError | null {
  if (typeof markup !== "string") {
    return new ParseError(`Expected markup string, received ${typeof markup}`)
  }
  if (isBinary(markup)) {
    return new ParseError("Document contains binary content")
  }
  return null
}

function loadMarkup(markup: string): Result<{ $: CheerioAPI; kind: MarkupKind }, ParseError> {
  const unreadable = checkReadable(markup)
  if (unreadable) return Err(unreadable)

  const kind = detectMarkupKind(markup)
  return trySync(
    () => ({ $: cheerio.load(markup, { xml: kind === "xml" }), kind }),
    (e) =>
      new ParseError(
        `Failed to parse ${kind.toUpperCase()} markup: ${e instanceof Error ? e.message : "Unknown error"}`
      )
  )
}

// ============================================================================
// Text Extraction
// ============================================================================

/**
 * Collapses horizontal whitespace, trims lines and drops empty ones.
 * The result has exactly one `\n` between paragraphs.
 */
export function normalizeWhitespace(text: string): NormalizedText {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/[^\S\n]+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n")
}

function extractText($: CheerioAPI, kind: MarkupKind): string {
  $(NON_CONTENT_SELECTOR).remove()
  $("br").replaceWith(BREAK)

  // XML has no notion of block elements, so every element boundary breaks
  const blocks = kind === "xml" ? $("*") : $(BLOCK_SELECTOR)
  blocks.each((_, el) => {
    $(el).before(BREAK)
    $(el).after(BREAK)
  })
  $(CELL_SELECTOR).after(" ")

  return $.root().text().replace(/\s+/g, " ").replaceAll(BREAK, "\n")
}

/**
 * Converts filing markup to normalized plain text.
 *
 * Returns Err(ParseError) when neither backend can read the input; callers
 * treat that as "no text for this filing".
 */
export function normalizeMarkup(markup: string): Result<NormalizedText, ParseError> {
  const unreadable = checkReadable(markup)
  if (unreadable) return Err(unreadable)
  if (!looksLikeMarkup(markup)) return Ok(normalizeWhitespace(markup))

  const loaded = loadMarkup(markup)
  if (!loaded.ok) return loaded

  const { $, kind } = loaded.value
  return trySync(
    () => escapeTagOpeners(normalizeWhitespace(extractText($, kind))),
    (e) =>
      new ParseError(
        `Failed to extract text: ${e instanceof Error ? e.message : "Unknown error"}`
      )
  )
}

/**
 * Throwing variant of normalizeMarkup.
 *
 * @throws ParseError - markup could not be parsed
 */
export function toPlainText(markup: string): NormalizedText {
  return unwrap(normalizeMarkup(markup))
}

// ============================================================================
// Tables
// ============================================================================

function normalizeCell(text: string): string {
  return text.replace(/\s+/g, " ").trim()
}

/**
 * Extracts every table as rows of cell text.
 *
 * Best-effort: rows are padded with empty cells to the widest row and a
 * `colspan` cell is followed by empty cells, so a ragged table still comes
 * back rectangular. Rows of nested tables belong to the nested table only.
 *
 * @throws ParseError - the document as a whole could not be parsed
 */
export function extractTables(markup: string): Table[] {
  const { $ } = unwrap(loadMarkup(markup))
  const tables: Table[] = []

  $("table").each((_, table) => {
    const rows: string[][] = []

    $(table)
      .find("tr")
      .each((_, tr) => {
        if ($(tr).closest("table").get(0) !== table) return

        const cells: string[] = []
        $(tr)
          .children(CELL_SELECTOR)
          .each((_, cell) => {
            cells.push(normalizeCell($(cell).text()))
            const span = Number.parseInt($(cell).attr("colspan") ?? "1", 10)
            const extra = Number.isFinite(span) ? Math.min(span, MAX_COLSPAN) - 1 : 0
            for (let i = 0; i < extra; i++) cells.push("")
          })
        rows.push(cells)
      })

    const width = rows.reduce((max, row) => Math.max(max, row.length), 0)
    tables.push(
      rows.map((row) => [...row, ...Array.from({ length: width - row.length }, () => "")])
    )
  })

  return tables
}
