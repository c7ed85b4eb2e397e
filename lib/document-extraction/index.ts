/**
 * @fileoverview Document extraction module
 *
 * `extractPdf` is not exported here: it loads unpdf lazily through
 * `extractDocument`.
 *
 * @module lib/document-extraction
 */

// Types
export {
  SUPPORTED_MIME_TYPES,
  type SupportedMimeType,
  type ExtractionResult,
  type QualityMetrics,
  type ExtractionWarning,
  type DocumentMetadata,
} from './types'

// Extractors
export { extractDocx } from './docx-extractor'

// Validators
export { validateExtractionQuality, detectLanguage, MIN_TEXT_LENGTH } from './validators'

// Unified extraction
export {
  extractDocument,
  isSupportedMimeType,
  mimeTypeForPath,
  type ExtractDocumentOptions,
} from './extract-document'
