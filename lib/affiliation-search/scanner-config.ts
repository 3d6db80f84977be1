/**
 * @fileoverview Scanner configuration
 *
 * Organization patterns, keyword lists and the context radius are grouped
 * into one immutable value passed at construction. Switching the target
 * organization means passing different patterns, nothing else.
 *
 * @module lib/affiliation-search/scanner-config
 */

import { z } from "zod"
import { ConfigurationError } from "@/lib/errors"

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_ORGANIZATION_PATTERNS: readonly (string | RegExp)[] = Object.freeze([
  "Boston University",
  "Boston U.",
])

export const DEFAULT_CONTEXT_WINDOW = 200

export const DEFAULT_KEYWORDS = Object.freeze({
  degree: Object.freeze([
    "B.A.",
    "B.S.",
    "Bachelor's",
    "Bachelor of",
    "Master's",
    "Master of",
    "M.A.",
    "M.B.A.",
    "MBA",
    "M.S.",
    "Ph.D.",
    "PhD",
    "J.D.",
    "M.D.",
    "LL.M.",
    "LL.B.",
    "Ed.D.",
  ]),
  role: Object.freeze([
    "professor",
    "faculty",
    "instructor",
    "lecturer",
    "researcher",
    "fellow",
    "trustee",
    "board member",
    "dean",
    "chair",
    "president",
    "chancellor",
    "provost",
  ]),
  education: Object.freeze([
    "studied",
    "attended",
    "graduated",
    "enrolled",
    "alumnus",
    "alumna",
    "alumni",
    "educated",
  ]),
  employment: Object.freeze([
    "served",
    "serves",
    "worked",
    "works",
    "employed",
    "appointed",
    "joined",
  ]),
})

// ============================================================================
// Schema
// ============================================================================

const keywordList = z
  .array(z.string().trim().min(1, "Keyword must not be blank"))
  .min(1, "At least one keyword is required")

const organizationPattern = z.union([
  z.string().trim().min(1, "Organization name must not be blank"),
  z.instanceof(RegExp).refine((re) => !new RegExp(`^(?:${re.source})$`, "i").test(""), {
    message: "Pattern must not match the empty string",
  }),
])

export const ScannerConfigSchema = z.object({
  organizationPatterns: z
    .array(organizationPattern)
    .min(1, "At least one organization pattern is required")
    .default([...DEFAULT_ORGANIZATION_PATTERNS]),
  keywords: z
    .object({
      degree: keywordList.default([...DEFAULT_KEYWORDS.degree]),
      role: keywordList.default([...DEFAULT_KEYWORDS.role]),
      education: keywordList.default([...DEFAULT_KEYWORDS.education]),
      employment: keywordList.default([...DEFAULT_KEYWORDS.employment]),
    })
    .default({
      degree: [...DEFAULT_KEYWORDS.degree],
      role: [...DEFAULT_KEYWORDS.role],
      education: [...DEFAULT_KEYWORDS.education],
      employment: [...DEFAULT_KEYWORDS.employment],
    }),
  contextWindow: z.number().int().nonnegative().default(DEFAULT_CONTEXT_WINDOW),
  attributeMentions: z.boolean().default(false),
})

/** Caller-facing shape: every field optional */
export type ScannerConfigInput = z.input<typeof ScannerConfigSchema>

export interface KeywordLists {
  readonly degree: readonly string[]
  readonly role: readonly string[]
  readonly education: readonly string[]
  readonly employment: readonly string[]
}

export interface ScannerConfig {
  readonly organizationPatterns: readonly (string | RegExp)[]
  readonly keywords: KeywordLists
  readonly contextWindow: number
  readonly attributeMentions: boolean
}

/**
 * Validates caller configuration and fills in defaults. The result is
 * frozen all the way down.
 *
 * @throws ConfigurationError - with one detail per invalid field
 */
export function parseScannerConfig(input: ScannerConfigInput = {}): ScannerConfig {
  const parsed = ScannerConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw ConfigurationError.fromZodError(parsed.error)
  }

  const { organizationPatterns, keywords, contextWindow, attributeMentions } = parsed.data
  return Object.freeze({
    organizationPatterns: Object.freeze(organizationPatterns),
    keywords: Object.freeze({
      degree: Object.freeze(keywords.degree),
      role: Object.freeze(keywords.role),
      education: Object.freeze(keywords.education),
      employment: Object.freeze(keywords.employment),
    }),
    contextWindow,
    attributeMentions,
  })
}

export const DEFAULT_SCANNER_CONFIG: ScannerConfig = parseScannerConfig()
