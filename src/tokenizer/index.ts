export {
  DEFAULT_ENCODING,
  createTokenizer,
  isEncodingName,
  supportedEncodings,
} from "./gpt-tokenizer.js";
export type { EncodingName, Tokenizer } from "./types.js";
