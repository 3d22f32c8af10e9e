import { createLogger } from "@lexalign/shared";
import { postprocessHypothesis } from "@lexalign/alignment";
import type { ITokenizerAdapter } from "@lexalign/tokenizer";
import {
  pairKey,
  type ITranslationEngine,
  type ITranslationRequest,
  type ITranslationResult,
  type ITranslator,
  type ITranslatorConfig,
} from "./translator.domain";
import { ModelNotFoundError } from "./errors";
import { variables } from "./environment";

const logger = createLogger("translator");

const toMap = <T>(entries: Map<string, T> | Record<string, T>) =>
  entries instanceof Map ? new Map(entries) : new Map(Object.entries(entries));

const splitWhitespace = (text: string) =>
  text.split(/\s+/).filter((token) => token.length > 0);

/**
 * Runs one constrained translation end to end: tokenize source and
 * constraints, hand them to the model and decoder, and turn each ranked
 * hypothesis back into text with its constraint spans.
 */
export class Translator implements ITranslator {
  private readonly _engines: Map<string, ITranslationEngine>;
  private readonly _processors: Map<string, ITokenizerAdapter>;
  private readonly _beamSize: number;
  private readonly _lengthFactor: number;
  private readonly _separator: string;

  constructor({
    engines,
    processors,
    beamSize,
    lengthFactor,
    separator,
  }: ITranslatorConfig) {
    this._engines = toMap<ITranslationEngine>(engines);
    this._processors = toMap<ITokenizerAdapter>(processors ?? {});
    this._beamSize = beamSize ?? variables.BEAM_SIZE;
    this._lengthFactor = lengthFactor ?? variables.LENGTH_FACTOR;
    this._separator = separator ?? variables.BPE_SEPARATOR;
  }

  get pairs(): string[] {
    return [...this._engines.keys()];
  }

  hasPair(sourceLang: string, targetLang: string): boolean {
    return this._engines.has(pairKey(sourceLang, targetLang));
  }

  async translate({
    sourceLang,
    targetLang,
    sourceSentence,
    targetConstraints,
    nBest = 1,
  }: ITranslationRequest): Promise<ITranslationResult> {
    const engine = this._engines.get(pairKey(sourceLang, targetLang));
    if (!engine) {
      logger.error({ sourceLang, targetLang }, "No model for language pair");
      throw new ModelNotFoundError(sourceLang, targetLang);
    }
    const { model, decoder } = engine;
    const startTime = performance.now();

    const sourceTokens = await this.tokenize(sourceLang, sourceSentence);
    const mappedInputs = model.mapInputs([sourceTokens.join(" ")]);

    const constraintTokens: string[][] = [];
    for (const constraint of targetConstraints ?? []) {
      constraintTokens.push(await this.tokenize(targetLang, constraint));
    }
    const mappedConstraints = model.mapConstraints(constraintTokens);

    const grid = await decoder.search({
      startHypothesis: model.startHypothesis(mappedInputs, mappedConstraints),
      constraints: mappedConstraints,
      maxHypothesisLength: Math.round(sourceTokens.length * this._lengthFactor),
      beamSize: Math.max(nBest, this._beamSize),
    });
    const hypotheses = await decoder.bestN(grid, model.eosToken, nBest);

    const outputs = hypotheses.map(({ tokens, constraintTags }) =>
      postprocessHypothesis(tokens, constraintTags, {
        separator: this._separator,
        endOfSentence: model.eosToken,
      }),
    );

    logger.info(
      {
        pair: pairKey(sourceLang, targetLang),
        nBest,
        constraints: constraintTokens.length,
        durationMS: Number((performance.now() - startTime).toFixed(2)),
      },
      "Translated",
    );

    return {
      rankedTranslations: outputs.map(({ text }) => text),
      constraintSpans: outputs.map(({ spans }) => spans),
    };
  }

  private async tokenize(lang: string, text: string): Promise<string[]> {
    const processor = this._processors.get(lang);
    return processor ? processor.tokenize(text) : splitWhitespace(text);
  }

  /**
   * Close every tokenizer process owned by this translator
   */
  async close(): Promise<void> {
    await Promise.all(
      [...this._processors.values()].map((processor) => processor.close()),
    );
  }
}
