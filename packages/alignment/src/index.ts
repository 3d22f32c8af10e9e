export type { AnnotatedText, ConstraintTag, Span } from "./domain";
export {
  remapConstraintIndices,
  expandConstraintIndices,
  alignCharacters,
} from "./remap";
export { tokenAnnotationsToSpans } from "./spans";
export { postprocessHypothesis, type PostprocessOptions } from "./postprocess";
export {
  OrphanSpanEndError,
  InvalidSpanError,
  AlignmentOverrunError,
  LengthMismatchError,
} from "./errors";
