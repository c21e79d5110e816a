/**
 * Maps text to a token count. Implementations must return the same count
 * for the same text for the lifetime of the instance.
 */
export interface Tokenizer {
  readonly name: string;
  countTokens(text: string): number;
}

export type EncodingName =
  | "r50k_base"
  | "p50k_base"
  | "cl100k_base"
  | "o200k_base";
