export {
  TokenizerAdapter,
  createTokenizerAdapter,
} from "./tokenizer-adapter";
export type {
  ITokenizerAdapter,
  ITokenizerAdapterConfig,
  ICreateTokenizerAdapterConfig,
} from "./tokenizer-adapter.domain";
export type { ILineTransport } from "./transport.domain";
export { exchange } from "./protocol";
export { LineReader } from "./line-reader";
export { StreamTransport } from "./stream-transport";
export {
  ProcessTransport,
  mosesTokenizerCommand,
  type IProcessTransportConfig,
} from "./process-transport";
export { TokenizerProtocolError } from "./errors";
