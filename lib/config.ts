/**
 * Scanner configuration from environment variables.
 *
 * | Variable                         | Format                        |
 * |----------------------------------|-------------------------------|
 * | AFFILIATION_ORGANIZATIONS        | comma-separated literal names |
 * | AFFILIATION_CONTEXT_WINDOW       | non-negative integer          |
 * | AFFILIATION_ATTRIBUTE_MENTIONS   | true / false / 1 / 0          |
 *
 * Unset variables keep the scanner defaults.
 */

import { z } from "zod"
import { ConfigurationError } from "@/lib/errors"
import {
  parseScannerConfig,
  type ScannerConfig,
  type ScannerConfigInput,
} from "@/lib/affiliation-search/scanner-config"

const EnvSchema = z.object({
  AFFILIATION_ORGANIZATIONS: z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((name) => name.trim())
        .filter((name) => name.length > 0)
    )
    .optional(),
  AFFILIATION_CONTEXT_WINDOW: z.coerce.number().int().nonnegative().optional(),
  AFFILIATION_ATTRIBUTE_MENTIONS: z
    .enum(["true", "false", "1", "0"])
    .transform((value) => value === "true" || value === "1")
    .optional(),
})

/**
 * Builds a validated scanner configuration from the environment.
 *
 * @throws ConfigurationError - malformed variable, or a variable that
 *   leaves the configuration invalid (e.g. no organization names)
 */
export function loadScannerConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): ScannerConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw ConfigurationError.fromZodError(parsed.error)
  }

  const {
    AFFILIATION_ORGANIZATIONS: organizationPatterns,
    AFFILIATION_CONTEXT_WINDOW: contextWindow,
    AFFILIATION_ATTRIBUTE_MENTIONS: attributeMentions,
  } = parsed.data

  const input: ScannerConfigInput = {
    ...(organizationPatterns !== undefined && { organizationPatterns }),
    ...(contextWindow !== undefined && { contextWindow }),
    ...(attributeMentions !== undefined && { attributeMentions }),
  }
  return parseScannerConfig(input)
}
