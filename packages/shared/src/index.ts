export { buildDynamic, lazilyValidate, variables } from "./environment";
export {
  LexalignError,
  EnvironmentError,
  isLexalignError,
  type ErrorDetails,
} from "./errors";
export { createLogger, type Logger } from "./logger";
