/**
 * @fileoverview Match deduplication
 *
 * Collapses matches produced when two organization patterns hit inside the
 * same window, or when one biography is scanned from overlapping sections.
 *
 * @module lib/affiliation-search/deduplicate
 */

import { CONFIDENCE_RANK, type AffiliationMatch } from "./types"

function normalizeContext(context: string): string {
  return context.toLowerCase().replace(/\s+/g, " ").trim()
}

function isDuplicate(a: AffiliationMatch, b: AffiliationMatch): boolean {
  if (a.affiliationType !== b.affiliationType) return false
  if (a.personName.trim().toLowerCase() !== b.personName.trim().toLowerCase()) return false

  const ca = normalizeContext(a.context)
  const cb = normalizeContext(b.context)
  return ca.includes(cb) || cb.includes(ca)
}

/**
 * Removes near-duplicate matches.
 *
 * Duplicates share a person name (case-insensitive) and an affiliation
 * type, and one context contains the other. Of a duplicate group the
 * highest confidence survives, the earliest on ties, in the slot of the
 * group's earliest member. Survivors are pairwise distinct, so a second
 * pass changes nothing.
 */
export function deduplicate(matches: readonly AffiliationMatch[]): AffiliationMatch[] {
  const survivors: AffiliationMatch[] = []

  for (const match of matches) {
    const duplicateSlots = survivors.flatMap((survivor, i) =>
      isDuplicate(survivor, match) ? [i] : []
    )
    if (duplicateSlots.length === 0) {
      survivors.push(match)
      continue
    }

    const group = [...duplicateSlots.map((i) => survivors[i]), match]
    const winner = group.reduce((best, candidate) =>
      CONFIDENCE_RANK[candidate.confidence] > CONFIDENCE_RANK[best.confidence] ? candidate : best
    )

    const [first, ...rest] = duplicateSlots
    survivors[first] = winner
    for (const slot of rest.reverse()) {
      survivors.splice(slot, 1)
    }
  }

  return survivors
}
