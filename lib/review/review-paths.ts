/**
 * @fileoverview Path-driven review dispatch for the command line
 *
 * One path is analyzed, two are compared, three to eight are ranked.
 *
 * @module lib/review/review-paths
 */

import { DEFAULT_ENGINE_SETTINGS, type EngineSettings } from "@/engine"
import { ValidationError } from "@/lib/errors"
import { analyzeSource, sourceFromPath, type AnalyzedDocument } from "./analyze-upload"
import { compareDocuments, type ComparisonResult } from "./compare"
import { MAX_RANKED_DOCUMENTS, rankDocuments, type RankingResult } from "./rank"

export type ReviewOutput =
  | { mode: "analysis"; document: AnalyzedDocument }
  | { mode: "comparison"; comparison: ComparisonResult }
  | { mode: "ranking"; ranking: RankingResult }

export async function reviewPaths(
  paths: readonly string[],
  settings: EngineSettings = DEFAULT_ENGINE_SETTINGS
): Promise<ReviewOutput> {
  if (paths.length === 0 || paths.length > MAX_RANKED_DOCUMENTS) {
    const message = `Pass between 1 and ${MAX_RANKED_DOCUMENTS} document paths, got ${paths.length}`
    throw new ValidationError(message, [{ field: "paths", message }])
  }

  const sources = await Promise.all(paths.map(sourceFromPath))

  switch (sources.length) {
    case 1:
      return { mode: "analysis", document: await analyzeSource(sources[0], settings) }
    case 2:
      return {
        mode: "comparison",
        comparison: await compareDocuments(sources[0], sources[1], settings),
      }
    default:
      return { mode: "ranking", ranking: await rankDocuments(sources, settings) }
  }
}
