import { TokenizerInitError, errorMessage } from "../errors.js";
import type { EncodingName, Tokenizer } from "./types.js";

export const DEFAULT_ENCODING: EncodingName = "r50k_base";

interface EncodingModule {
  encode(
    text: string,
    options?: { disallowedSpecial?: Set<string> },
  ): number[];
}

const ENCODING_LOADERS: Readonly<
  Record<EncodingName, () => Promise<EncodingModule>>
> = {
  r50k_base: async () => await import("gpt-tokenizer/encoding/r50k_base"),
  p50k_base: async () => await import("gpt-tokenizer/encoding/p50k_base"),
  cl100k_base: async () => await import("gpt-tokenizer/encoding/cl100k_base"),
  o200k_base: async () => await import("gpt-tokenizer/encoding/o200k_base"),
};

// Source files may legitimately contain "<|endoftext|>"; count it as text.
const NO_DISALLOWED_SPECIAL = new Set<string>();

export function isEncodingName(value: string): value is EncodingName {
  return Object.hasOwn(ENCODING_LOADERS, value);
}

export function supportedEncodings(): EncodingName[] {
  return Object.keys(ENCODING_LOADERS).filter(isEncodingName);
}

/**
 * Load a BPE encoding once. Any failure here is fatal: no run may start
 * without a working tokenizer.
 */
export async function createTokenizer(
  encoding: string = DEFAULT_ENCODING,
): Promise<Tokenizer> {
  if (!isEncodingName(encoding)) {
    throw new TokenizerInitError(
      `Unknown encoding "${encoding}". Supported: ${supportedEncodings().join(", ")}`,
    );
  }

  let module: EncodingModule;
  try {
    module = await ENCODING_LOADERS[encoding]();
  } catch (error) {
    throw new TokenizerInitError(
      `Failed to load encoding ${encoding}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  return {
    name: encoding,
    countTokens: (text: string): number =>
      text.length === 0
        ? 0
        : module.encode(text, { disallowedSpecial: NO_DISALLOWED_SPECIAL })
            .length,
  };
}
