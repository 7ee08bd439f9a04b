import { RiskRuleEngine } from "../audit/rule-engine.js";
import type { Finding, RuleLibrary } from "../audit/types.js";
import type { EngineConfig } from "../config/engine-config.js";
import type { DocumentStore } from "../core/contracts/document-store.js";
import type { CompletionProvider } from "../core/contracts/provider.js";
import { InputError, errorMessage } from "../core/errors.js";
import { extractContractFields, type ContractFields } from "../extraction/field-extractor.js";
import { ChunkCache } from "../retrieval/chunk-cache.js";
import { chunkPages } from "../retrieval/chunker.js";
import { scoreChunks } from "../retrieval/relevance-scorer.js";
import type { Chunk, RankingResult } from "../retrieval/types.js";
import { devLog, devWarn } from "../shared/index.js";
import type { AnswerStream } from "../streaming/answer-stream.js";
import { StreamCoordinator } from "../streaming/stream-coordinator.js";
import { createSynthesizer } from "../synthesis/index.js";
import type { Answer, AnswerSynthesizer, SynthesisStrategy } from "../synthesis/types.js";

export interface ContractEngineOptions {
  documentStore: DocumentStore;
  config: EngineConfig;
  /** Completion-backed synthesis needs both this and `config.completion.enabled`. */
  provider?: CompletionProvider;
  /** Required by getAudit; engines without one answer questions only. */
  ruleLibrary?: RuleLibrary;
  chunkCache?: ChunkCache;
}

export interface StreamRequestOptions {
  signal?: AbortSignal;
}

export class ContractEngine {
  private readonly store: DocumentStore;
  private readonly config: EngineConfig;
  private provider?: CompletionProvider;
  private readonly rules?: RiskRuleEngine;
  private readonly chunkCache: ChunkCache;
  private synthesizer: AnswerSynthesizer;
  private coordinator: StreamCoordinator;

  constructor(options: ContractEngineOptions) {
    this.store = options.documentStore;
    this.config = options.config;
    this.chunkCache = options.chunkCache ?? new ChunkCache();
    this.rules = options.ruleLibrary ? new RiskRuleEngine(options.ruleLibrary) : undefined;
    this.provider = options.config.completion.enabled ? options.provider : undefined;

    const strategy = this.resolveStrategy();
    this.synthesizer = createSynthesizer(strategy);
    this.coordinator = new StreamCoordinator(strategy);
  }

  private applyStrategy(strategy: SynthesisStrategy): void {
    this.synthesizer = createSynthesizer(strategy);
    this.coordinator = new StreamCoordinator(strategy);
  }

  get synthesisStrategy(): SynthesisStrategy["kind"] {
    return this.synthesizer.strategy;
  }

  get ruleLibraryVersion(): string | undefined {
    return this.rules?.version;
  }

  /** A provider that fails to start is dropped and answers become extractive. */
  async start(): Promise<void> {
    const provider = this.provider;
    if (provider) {
      try {
        await provider.start();
        devLog(`Provider "${provider.name}" started`);
      } catch (err) {
        devWarn(`Provider "${provider.name}" failed to start (${errorMessage(err)}); answers are extractive`);
        this.provider = undefined;
        this.applyStrategy(this.resolveStrategy());
      }
    } else {
      devWarn("No completion provider configured; answers are extractive");
    }
    devLog("ContractEngine started");
  }

  async stop(): Promise<void> {
    if (this.provider) {
      await this.provider.stop();
      devLog(`Provider "${this.provider.name}" stopped`);
    }
    devLog("ContractEngine stopped");
  }

  async getChunks(documentId: string): Promise<readonly Chunk[]> {
    return this.chunkCache.getOrCompute(documentId, async () => {
      const pages = await this.store.getPages(documentId);
      return chunkPages(documentId, pages, {
        chunkSize: this.config.retrieval.chunkSize,
        overlapRatio: this.config.retrieval.overlapRatio,
      });
    });
  }

  async getAnswer(question: string, documentIds?: readonly string[]): Promise<Answer> {
    const normalized = this.requireQuestion(question);
    const ranking = await this.rank(normalized, documentIds);
    return this.synthesizer.answer(normalized, ranking.ranked, { relevanceSignal: ranking.signal });
  }

  /** Input is validated and chunks ranked before the stream is handed back. */
  async getAnswerStream(
    question: string,
    documentIds?: readonly string[],
    options?: StreamRequestOptions,
  ): Promise<AnswerStream> {
    const normalized = this.requireQuestion(question);
    const ranking = await this.rank(normalized, documentIds);
    return this.coordinator.stream(normalized, ranking.ranked, {
      relevanceSignal: ranking.signal,
      ...(options?.signal ? { signal: options.signal } : {}),
    });
  }

  async getAudit(documentId: string): Promise<Finding[]> {
    if (!this.rules) {
      throw new Error("No rule library loaded; audits are unavailable.");
    }
    return this.rules.audit(await this.getChunks(documentId));
  }

  async extractFields(documentId: string): Promise<ContractFields> {
    return extractContractFields(await this.getChunks(documentId));
  }

  async listDocuments(): Promise<string[]> {
    return this.store.listDocumentIds();
  }

  private resolveStrategy(): SynthesisStrategy {
    if (!this.provider) return { kind: "extractive" };
    const { timeoutMs, maxTokens, temperature, promptTokenBudget } = this.config.completion;
    return { kind: "completion", provider: this.provider, timeoutMs, maxTokens, temperature, promptTokenBudget };
  }

  private requireQuestion(question: string): string {
    const trimmed = typeof question === "string" ? question.trim() : "";
    if (trimmed.length === 0) {
      throw new InputError("Question must not be empty.", "EMPTY_QUESTION");
    }
    return trimmed;
  }

  /** Chunk sets of every candidate document are scored together. */
  private async rank(question: string, documentIds?: readonly string[]): Promise<RankingResult> {
    const ids = documentIds && documentIds.length > 0 ? [...new Set(documentIds)] : await this.store.listDocumentIds();
    const chunkSets = await Promise.all(ids.map((id) => this.getChunks(id)));
    return scoreChunks(question, chunkSets.flat(), {
      topK: this.config.retrieval.topK,
      relevanceFloor: this.config.retrieval.relevanceFloor,
      proximityWindow: this.config.retrieval.proximityWindow,
    });
  }
}
