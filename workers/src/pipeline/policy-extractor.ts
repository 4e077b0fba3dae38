/**
 * PolicyExtractor
 *
 * Entry point of the pipeline: PDF bytes in, validated policy record and
 * report out. Each call owns its pages, chunks and merged fields; nothing
 * is shared between concurrent runs. Only EmptyDocumentError (and
 * RunAbortedError when the caller aborts) is thrown.
 */

import type { PipelineConfig } from "../config.js";
import { EmptyDocumentError } from "../errors.js";
import type { PolicySchema } from "../schema/policy-schema.js";
import type {
  CompletionModel,
  ExtractionOutcome,
  OcrEngine,
  PageDecoder,
  PageSource,
} from "../types.js";
import { mapWithConcurrency } from "./concurrency.js";
import { assembleDocumentText } from "./document-text-assembler.js";
import { ExtractionOrchestrator } from "./extraction-orchestrator.js";
import { PageTextResolver } from "./page-text-resolver.js";
import { PromptChunker } from "./prompt-chunker.js";
import { SchemaNormalizer } from "./schema-normalizer.js";

export interface PolicyExtractorDeps {
  decoder: PageDecoder;
  ocr: OcrEngine;
  model: CompletionModel;
  schema: PolicySchema;
  config: Omit<PipelineConfig, "schemaPath">;
}

let runCounter = 0;

export class PolicyExtractor {
  private decoder: PageDecoder;
  private resolver: PageTextResolver;
  private chunker: PromptChunker;
  private orchestrator: ExtractionOrchestrator;
  private normalizer: SchemaNormalizer;
  private pageConcurrency: number;

  constructor(deps: PolicyExtractorDeps) {
    const { config } = deps;
    this.decoder = deps.decoder;
    this.resolver = new PageTextResolver(deps.ocr, config.page);
    this.chunker = new PromptChunker(deps.schema, config.chunkBudget);
    this.orchestrator = new ExtractionOrchestrator(
      deps.model,
      deps.schema,
      config.completion,
    );
    this.normalizer = new SchemaNormalizer(deps.schema);
    this.pageConcurrency = config.page.concurrency;
  }

  async extract(
    pdfBytes: Uint8Array,
    options: { signal?: AbortSignal } = {},
  ): Promise<ExtractionOutcome> {
    const { signal } = options;
    const tag = `[PolicyExtractor] run ${++runCounter}`;
    const startedAt = Date.now();

    const sources = await this.decode(pdfBytes);
    console.log(`${tag}: ${sources.length} page(s), ${pdfBytes.byteLength} bytes`);

    const pages = await mapWithConcurrency(
      sources,
      this.pageConcurrency,
      (source) => this.resolver.resolve(source, { signal }),
      signal,
    );

    const document = assembleDocumentText(pages);
    const chunks = this.chunker.chunk(document);
    const { merged, failures } = await this.orchestrator.run(chunks, { signal });
    const { data, report } = this.normalizer.normalize(merged, failures);

    const warnings = document.pages
      .filter((page) => page.ocrError !== null)
      .map((page) => `Page ${page.index + 1}: OCR failed (${page.ocrError})`);

    console.log(
      `${tag}: done in ${Date.now() - startedAt}ms, ${chunks.length} chunk(s), valid=${report.isValid}`,
    );

    return {
      data,
      report,
      pages: document.pages.map((page) => ({
        pageIndex: page.index,
        method: page.method,
        confidence: page.confidence,
      })),
      chunkCount: chunks.length,
      warnings,
    };
  }

  private async decode(pdfBytes: Uint8Array): Promise<PageSource[]> {
    let sources: PageSource[];
    try {
      sources = await this.decoder.decode(pdfBytes);
    } catch (error) {
      throw new EmptyDocumentError("Unable to read PDF document", error);
    }
    if (sources.length === 0) {
      throw new EmptyDocumentError("Document has no pages");
    }
    return sources;
  }
}
