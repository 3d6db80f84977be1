/**
 * @fileoverview Affiliation scanner
 *
 * Scans biography text (or a whole filing when no biography section is
 * found) for mentions of the configured organization and classifies each
 * mention from the text around it.
 *
 * Pipeline for one filing:
 * 1. Normalize markup to text
 * 2. Locate biography sections by heading
 * 3. Segment each section into per-person bios
 * 4. Scan each bio with its person name
 *
 * Sections that yield no bios are scanned whole; a filing with no sections
 * is scanned whole. All attributions in those fallbacks are "Unknown"
 * unless `attributeMentions` is on.
 *
 * @module lib/affiliation-search/affiliation-scanner
 */

import { logger } from "@/lib/logger"
import {
  createBiographySegmenter,
  type BiographySegmenter,
} from "@/lib/filing-extraction/biography-segmenter"
import { selectNameRecognizer } from "@/lib/filing-extraction/person-names"
import { findBioSections } from "@/lib/filing-extraction/section-locator"
import { normalizeMarkup } from "@/lib/filing-extraction/text-normalizer"
import {
  UNKNOWN,
  type NerBackend,
  type PersonBio,
  type PersonNameRecognizer,
} from "@/lib/filing-extraction/types"
import {
  createDetailExtractor,
  createPriorityClassifier,
  literalSource,
  type AffiliationDetails,
} from "./classifier"
import { parseScannerConfig, type ScannerConfig, type ScannerConfigInput } from "./scanner-config"
import {
  CONFIDENCE_BY_TYPE,
  type AffiliationClassifier,
  type AffiliationMatch,
  type FilingAnalysis,
  type FilingMetadata,
} from "./types"

export interface AffiliationScannerOptions {
  config?: ScannerConfigInput
  /** Replaces the priority classifier; confidence still follows the type */
  classifier?: AffiliationClassifier
  /** Used for mention attribution and paragraph segmentation */
  nameRecognizer?: PersonNameRecognizer
  /** Probed once when no nameRecognizer is given */
  nerBackend?: NerBackend
  segmenter?: BiographySegmenter
}

/**
 * Compiles an organization pattern for scanning. Strings are literal names;
 * RegExps keep their source and flags, made global and case-insensitive.
 */
export function compileOrganizationPattern(pattern: string | RegExp): RegExp {
  if (typeof pattern === "string") {
    return new RegExp(`(?<![A-Za-z0-9])(?:${literalSource(pattern)})(?![A-Za-z0-9])`, "gi")
  }
  const flags = new Set([...pattern.flags, "g", "i"])
  return new RegExp(pattern.source, [...flags].join(""))
}

export class AffiliationScanner {
  readonly config: ScannerConfig
  readonly nameRecognizer: PersonNameRecognizer

  private readonly patterns: readonly RegExp[]
  private readonly classify: AffiliationClassifier
  private readonly extractDetails: (context: string) => AffiliationDetails
  private readonly segmenter: BiographySegmenter

  /**
   * @throws ConfigurationError - invalid configuration
   */
  constructor(options: AffiliationScannerOptions = {}) {
    this.config = parseScannerConfig(options.config)
    this.nameRecognizer = options.nameRecognizer ?? selectNameRecognizer(options.nerBackend)
    this.patterns = Object.freeze(this.config.organizationPatterns.map(compileOrganizationPattern))
    this.classify = options.classifier ?? createPriorityClassifier(this.config.keywords)
    this.extractDetails = createDetailExtractor(this.config.keywords.degree)
    this.segmenter =
      options.segmenter ?? createBiographySegmenter({ nameRecognizer: this.nameRecognizer })
  }

  // ==========================================================================
  // Text Scanning
  // ==========================================================================

  /**
   * Finds every organization mention in text.
   *
   * Occurrences are reported pattern by pattern, in text order within each
   * pattern. No occurrences is an empty result.
   */
  findAffiliationsInText(text: string, personName?: string): AffiliationMatch[] {
    const matches: AffiliationMatch[] = []
    const window = this.config.contextWindow

    for (const pattern of this.patterns) {
      for (const occurrence of text.matchAll(pattern)) {
        const organization = occurrence[0]
        if (organization.length === 0) continue

        const position = occurrence.index ?? 0
        const contextStart = Math.max(0, position - window)
        const contextEnd = Math.min(text.length, position + organization.length + window)
        const context = text.slice(contextStart, contextEnd)

        const affiliationType = this.classify(context)
        matches.push(
          Object.freeze({
            personName: personName ?? this.attribute(text.slice(contextStart, position)),
            affiliationType,
            organization,
            context,
            confidence: CONFIDENCE_BY_TYPE[affiliationType],
            ...this.extractDetails(context),
          })
        )
      }
    }

    return matches
  }

  /**
   * Nearest person name before a mention, when attribution is enabled.
   */
  private attribute(leadingContext: string): string {
    if (!this.config.attributeMentions) return UNKNOWN
    const names = this.nameRecognizer.extractPersonNames(leadingContext)
    return names.at(-1)?.name ?? UNKNOWN
  }

  // ==========================================================================
  // Filing Scanning
  // ==========================================================================

  /**
   * Scans a whole filing. Unparseable markup is logged and yields no matches.
   */
  searchFiling(markup: string, filingMetadata?: FilingMetadata): AffiliationMatch[] {
    return this.analyzeFiling(markup, filingMetadata).matches
  }

  /**
   * Scans a whole filing and reports every intermediate result.
   */
  analyzeFiling(markup: string, filingMetadata?: FilingMetadata): FilingAnalysis {
    const normalized = normalizeMarkup(markup)
    if (!normalized.ok) {
      logger.warn("Filing markup could not be parsed", {
        reason: normalized.error.message,
        ...filingMetadata,
      })
      return {
        text: "",
        sections: [],
        bios: [],
        matches: [],
        usedFallback: false,
        parseError: normalized.error,
      }
    }

    const text = normalized.value
    const sections = findBioSections(text)
    const bios: PersonBio[] = []
    const matches: AffiliationMatch[] = []
    const attach = (found: AffiliationMatch[]): AffiliationMatch[] =>
      filingMetadata
        ? found.map((match) => Object.freeze({ ...match, filingInfo: filingMetadata }))
        : found

    if (sections.length === 0) {
      logger.info("No biography sections found, scanning whole filing", {
        textLength: text.length,
        ...filingMetadata,
      })
      matches.push(...attach(this.findAffiliationsInText(text)))
      return { text, sections, bios, matches, usedFallback: true }
    }

    for (const section of sections) {
      const sectionBios = this.segmenter.segment(section.text)
      if (sectionBios.length === 0) {
        matches.push(...attach(this.findAffiliationsInText(section.text)))
        continue
      }

      bios.push(...sectionBios)
      for (const bio of sectionBios) {
        matches.push(...attach(this.findAffiliationsInText(bio.bioText, bio.name)))
      }
    }

    logger.info("Filing scanned", {
      sections: sections.length,
      bios: bios.length,
      matches: matches.length,
      ...filingMetadata,
    })

    return { text, sections, bios, matches, usedFallback: false }
  }
}
