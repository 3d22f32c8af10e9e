import type { ConstraintTag, Span } from "@lexalign/alignment";
import type { ITokenizerAdapter } from "@lexalign/tokenizer";

/**
 * The translation model, as far as pre- and post-processing is concerned.
 * Mapped inputs, constraints and hypotheses are opaque here.
 */
export interface ITranslationModel<
  TInputs = unknown,
  TConstraints = unknown,
  THypothesis = unknown,
> {
  readonly eosToken: string;
  mapInputs(inputs: string[]): TInputs;
  mapConstraints(constraints: string[][]): TConstraints;
  startHypothesis(inputs: TInputs, constraints: TConstraints): THypothesis;
}

export interface ISearchOptions<TConstraints, THypothesis> {
  startHypothesis: THypothesis;
  constraints: TConstraints;
  maxHypothesisLength: number;
  beamSize: number;
}

/**
 * One ranked output: tokens without the start symbol, and a constraint tag
 * per token
 */
export interface IDecodedHypothesis {
  tokens: string[];
  constraintTags: ConstraintTag[];
}

export interface IConstrainedDecoder<
  TConstraints = unknown,
  THypothesis = unknown,
  TGrid = unknown,
> {
  search(options: ISearchOptions<TConstraints, THypothesis>): TGrid | Promise<TGrid>;
  bestN(
    grid: TGrid,
    eosToken: string,
    nBest: number,
  ): IDecodedHypothesis[] | Promise<IDecodedHypothesis[]>;
}

export interface ITranslationEngine<
  TInputs = unknown,
  TConstraints = unknown,
  THypothesis = unknown,
  TGrid = unknown,
> {
  model: ITranslationModel<TInputs, TConstraints, THypothesis>;
  decoder: IConstrainedDecoder<TConstraints, THypothesis, TGrid>;
}

export interface ITranslationRequest {
  sourceLang: string;
  targetLang: string;
  sourceSentence: string;
  targetConstraints?: string[];
  nBest?: number;
}

export interface ITranslationResult {
  rankedTranslations: string[];
  /** Character spans of the constraints in each ranked translation */
  constraintSpans: Span[][];
}

export interface ITranslatorConfig {
  /** Engines keyed by language pair, see {@link pairKey} */
  engines: Map<string, ITranslationEngine> | Record<string, ITranslationEngine>;
  /** Tokenizer adapters keyed by language code */
  processors?: Map<string, ITokenizerAdapter> | Record<string, ITokenizerAdapter>;
  beamSize?: number;
  lengthFactor?: number;
  separator?: string;
}

export interface ITranslator {
  translate(request: ITranslationRequest): Promise<ITranslationResult>;
  hasPair(sourceLang: string, targetLang: string): boolean;
  readonly pairs: string[];
  /** Release every tokenizer process the translator owns */
  close(): Promise<void>;
}

export const pairKey = (sourceLang: string, targetLang: string) =>
  `${sourceLang}-${targetLang}`;
