import { describe, it, expect } from "vitest"
import { createTestMatch } from "@/test/factories"
import { AFFILIATION_EXPORT_COLUMNS, toExportRecord } from "./export-record"

describe("toExportRecord", () => {
  it("projects a match and its filing metadata", () => {
    const match = createTestMatch({
      affiliationType: "degree",
      filingInfo: {
        filing_type: "DEF 14A",
        filing_date: "2024-04-01",
        company_name: "Acme Corp",
        ticker: "ACME",
      },
    })

    expect(toExportRecord(match)).toEqual({
      person_name: "Jane Doe",
      affiliation_type: "degree",
      organization: "Boston University",
      context: "Jane Doe spoke at Boston University",
      confidence: "high",
      filing_type: "DEF 14A",
      filing_date: "2024-04-01",
      company_name: "Acme Corp",
      ticker: "ACME",
    })
  })

  it("falls back to the date field", () => {
    const match = createTestMatch({ filingInfo: { date: "2023-03-15" } })

    expect(toExportRecord(match).filing_date).toBe("2023-03-15")
  })

  it("fills missing metadata with empty strings", () => {
    const record = toExportRecord(createTestMatch())

    expect([record.filing_type, record.filing_date, record.company_name, record.ticker]).toEqual([
      "",
      "",
      "",
      "",
    ])
  })

  it("truncates context to 500 characters", () => {
    const record = toExportRecord(createTestMatch({ context: "x".repeat(800) }))

    expect(record.context).toHaveLength(500)
  })

  it("has a value for every export column", () => {
    expect(Object.keys(toExportRecord(createTestMatch())).sort()).toEqual(
      [...AFFILIATION_EXPORT_COLUMNS].sort()
    )
  })
})
