/**
 * @fileoverview Single-document review flow
 *
 * Resolves a document source (inline text, a file on disk, or a saved
 * analysis) to an analysis result. Files go through text extraction first;
 * a file that cannot be extracted is analyzed as empty text and carries the
 * extraction error alongside its degenerate result.
 *
 * @module lib/review/analyze-upload
 */

import { readFile } from "node:fs/promises"
import { extname } from "node:path"
import {
  analysisResultSchema,
  analyzeDocument,
  deepFreeze,
  DEFAULT_ENGINE_SETTINGS,
  type EngineSettings,
  type FrozenAnalysisResult,
} from "@/engine"
import { extractDocument, mimeTypeForPath } from "@/lib/document-extraction"
import { NotFoundError, ValidationError, type SerializedError } from "@/lib/errors"
import { logger } from "@/lib/logger"

// ============================================================================
// Types
// ============================================================================

export type DocumentSource =
  | { kind: "text"; name: string; text: string }
  | { kind: "file"; name: string; path: string }
  | { kind: "saved"; name: string; data: unknown }

export interface AnalyzedDocument {
  name: string
  result: FrozenAnalysisResult
  /** Present when the file could not be extracted */
  extractionError?: SerializedError
}

// ============================================================================
// Sources
// ============================================================================

/** `.json` files are read back as saved analyses, anything else is extracted */
export async function sourceFromPath(path: string): Promise<DocumentSource> {
  if (extname(path).toLowerCase() !== ".json") {
    return { kind: "file", name: path, path }
  }

  const raw = await readSource(path)
  try {
    return { kind: "saved", name: path, data: JSON.parse(raw.toString("utf-8")) }
  } catch (error) {
    throw new ValidationError(`Saved analysis is not valid JSON: ${path}`, [
      { field: "path", message: error instanceof Error ? error.message : String(error) },
    ])
  }
}

async function readSource(path: string): Promise<Buffer> {
  try {
    return await readFile(path)
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new NotFoundError(`File not found: ${path}`)
    }
    throw error
  }
}

/**
 * Validates a previously serialized analysis result.
 *
 * @throws ValidationError when the data is not an analysis result
 */
export function loadSavedAnalysis(data: unknown): FrozenAnalysisResult {
  const parsed = analysisResultSchema.safeParse(data)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }
  return deepFreeze(parsed.data)
}

// ============================================================================
// Analysis
// ============================================================================

export async function analyzeSource(
  source: DocumentSource,
  settings: EngineSettings = DEFAULT_ENGINE_SETTINGS
): Promise<AnalyzedDocument> {
  let analyzed: AnalyzedDocument

  switch (source.kind) {
    case "text":
      analyzed = { name: source.name, result: analyzeDocument(source.text, settings) }
      break
    case "saved":
      analyzed = { name: source.name, result: loadSavedAnalysis(source.data) }
      break
    case "file": {
      const buffer = await readSource(source.path)
      const extracted = await extractDocument(buffer, mimeTypeForPath(source.path))
      analyzed = extracted.ok
        ? { name: source.name, result: analyzeDocument(extracted.value.text, settings) }
        : {
            name: source.name,
            result: analyzeDocument("", settings),
            extractionError: extracted.error.toJSON(),
          }
      break
    }
  }

  logger.info("Document analyzed", {
    name: analyzed.name,
    source: source.kind,
    documentType: analyzed.result.documentType,
    riskScore: analyzed.result.riskScore,
    redFlagCount: analyzed.result.redFlags.length,
    extracted: analyzed.extractionError === undefined,
  })
  return analyzed
}
