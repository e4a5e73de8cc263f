import { getEncoding, type Tiktoken } from "js-tiktoken";

export const CONTEXT_TOKEN_ENCODING = "cl100k_base";

let encoding: Tiktoken | undefined;

// Loading the rank table is the expensive part, so it happens once, on first use.
const loadEncoding = (): Tiktoken => {
  encoding ??= getEncoding(CONTEXT_TOKEN_ENCODING);
  return encoding;
};

/**
 * Counts the tokens of the text an agent loads before it starts: context documents
 * and the declaration outline of every source file. Special-token markers inside
 * the text are encoded as ordinary text.
 */
export const countContextTokens = (parts: readonly string[]): number => {
  const text = parts.join("\n");
  return text === "" ? 0 : loadEncoding().encode(text, [], []).length;
};
