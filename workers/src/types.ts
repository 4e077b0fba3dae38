/**
 * Pipeline Types
 *
 * Contracts between the extraction stages and the external capabilities
 * (PDF decoding, OCR, text completion) they consume.
 */

// ============================================================================
// External Capabilities
// ============================================================================

/** A page rendered for OCR: an image, or a single-page PDF. */
export interface PageImage {
  pageIndex: number;
  mimeType: string;
  data: Uint8Array;
}

/** One decoded page: its embedded text layer plus a lazy renderer. */
export interface PageSource {
  /** 0-based page index */
  index: number;
  /** Text from the PDF text layer (may be empty) */
  nativeText: string;
  /** Only called when the native text is not trusted */
  renderImage(): Promise<PageImage>;
}

export interface PageDecoder {
  decode(pdfBytes: Uint8Array): Promise<PageSource[]>;
}

export interface OcrEngine {
  /** May return an empty string */
  recognize(image: PageImage, options?: { signal?: AbortSignal }): Promise<string>;
}

export interface ChunkPrompt {
  system: string;
  user: string;
}

export interface CompletionModel {
  complete(
    prompt: ChunkPrompt,
    options: { responseBudget: number; signal?: AbortSignal },
  ): Promise<string>;
}

// ============================================================================
// Text Acquisition
// ============================================================================

export type AcquisitionMethod = "native" | "ocr";

export interface Page {
  readonly index: number;
  readonly nativeText: string;
  /** null when OCR was never needed */
  readonly ocrText: string | null;
  /** Why OCR produced nothing, when it was attempted and failed */
  readonly ocrError: string | null;
  readonly text: string;
  readonly method: AcquisitionMethod;
  /** Share of letters/digits among the chosen text's visible characters, 0-1 */
  readonly confidence: number;
}

export interface PageSpan {
  readonly pageIndex: number;
  /** Offset of the page delimiter in DocumentText.text */
  readonly start: number;
  /** Exclusive end offset, the next page's start */
  readonly end: number;
  readonly method: AcquisitionMethod;
}

export interface DocumentText {
  readonly pages: readonly Page[];
  readonly spans: readonly PageSpan[];
  readonly text: string;
}

// ============================================================================
// Chunking & Extraction
// ============================================================================

export type BudgetUnit = "chars" | "tokens";

export interface ChunkBudget {
  size: number;
  unit: BudgetUnit;
}

export interface ExtractionChunk {
  readonly index: number;
  readonly text: string;
  /** Offset range into DocumentText.text, end exclusive */
  readonly start: number;
  readonly end: number;
  /** Pages whose text overlaps this chunk */
  readonly pageIndices: readonly number[];
  readonly prompt: ChunkPrompt;
  /** Same chunk with the stricter "JSON only" instruction appended */
  readonly retryPrompt: ChunkPrompt;
}

export interface RawExtractionResult {
  chunkIndex: number;
  /** Field path -> value, null when nothing usable came back */
  fields: Record<string, unknown> | null;
  /** Set when the response was only partially parseable, or not at all */
  parseError: string | null;
  attempts: number;
}

export interface MergeCandidate {
  value: unknown;
  chunkIndex: number;
}

export type MergedRecord = ReadonlyMap<string, MergeCandidate>;

// ============================================================================
// Validation
// ============================================================================

export interface FieldError {
  field: string;
  reason: string;
}

export interface ChunkFailure {
  chunkIndex: number;
  reason: string;
}

export interface ValidationReport {
  readonly isValid: boolean;
  readonly errors: readonly FieldError[];
  /** Required field paths with no surviving value */
  readonly missingFields: readonly string[];
  readonly failedChunks: readonly ChunkFailure[];
}

export type PolicyRecord = Record<string, unknown>;

export interface ValidatedRecord {
  readonly data: PolicyRecord;
  readonly report: ValidationReport;
}

export interface PageProvenance {
  pageIndex: number;
  method: AcquisitionMethod;
  confidence: number;
}

export interface ExtractionOutcome extends ValidatedRecord {
  readonly pages: readonly PageProvenance[];
  readonly chunkCount: number;
  /** Recovered anomalies worth showing to the caller (failed page OCR) */
  readonly warnings: readonly string[];
}
