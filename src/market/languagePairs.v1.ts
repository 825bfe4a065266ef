// src/market/languagePairs.v1.ts

import { fail } from "./errors.v1";
import type { LanguagePairsInput, LocalizedText } from "./types.v1";

export function decodeLanguagePairs(input: LanguagePairsInput): LocalizedText {
  const { codes, texts } = input;
  if (codes.length !== texts.length) {
    fail("MalformedLanguagePair", `${codes.length} codes for ${texts.length} texts`);
  }

  const out: LocalizedText = {};
  for (let i = 0; i < codes.length; i++) {
    const code = codes[i];
    if (code.length !== 2) fail("MalformedLanguagePair", `language code "${code}" must be two characters`);
    if (Object.prototype.hasOwnProperty.call(out, code)) fail("MalformedLanguagePair", `duplicate language code "${code}"`);
    out[code] = texts[i];
  }
  return out;
}
