export { Translator } from "./translator";
export {
  pairKey,
  type IConstrainedDecoder,
  type IDecodedHypothesis,
  type ISearchOptions,
  type ITranslationEngine,
  type ITranslationModel,
  type ITranslationRequest,
  type ITranslationResult,
  type ITranslator,
  type ITranslatorConfig,
} from "./translator.domain";
export { ModelNotFoundError } from "./errors";
