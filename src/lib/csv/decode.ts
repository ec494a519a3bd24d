import type { DecodedText } from "@/types";

export interface CandidateDecoder {
  encoding: string;
  /** Throws when the bytes are not valid in this encoding. */
  decode: (bytes: Uint8Array) => string;
}

export const utf8Decoder: CandidateDecoder = {
  encoding: "utf-8",
  decode: (bytes) => new TextDecoder("utf-8", { fatal: true }).decode(bytes),
};

// WHATWG maps the "latin1" label to windows-1252, so go through Buffer for real ISO-8859-1.
export const latin1Decoder: CandidateDecoder = {
  encoding: "latin-1",
  decode: (bytes) => Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1"),
};

export const DEFAULT_DECODERS: readonly CandidateDecoder[] = [utf8Decoder, latin1Decoder];

/** Tries each decoder in order and returns the first successful result. */
export function decodeText(
  bytes: Uint8Array,
  decoders: readonly CandidateDecoder[] = DEFAULT_DECODERS
): DecodedText {
  const failures: string[] = [];
  for (const decoder of decoders) {
    try {
      return { text: decoder.decode(bytes), encoding: decoder.encoding };
    } catch (err) {
      failures.push(`${decoder.encoding}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  throw new Error(`Unable to decode upload (${failures.join("; ") || "no decoders configured"})`);
}
