// SPDX-License-Identifier: Apache-2.0
import { QueryValidationError } from "./errors";

/** Marker at the start of a phrase string that carries tokens instead of text. */
export const QUERY_TOKENS_MARKER = "$!Tokens~";

const SLOT_SEP = "|";
const COLOCATED_SEP = ">";
const ZERO = "\0";
const ZERO_ESCAPE = "$!ZeRo";

/** One token position: a single token, or several co-located tokens (synonyms). */
export type TokenSlot = string | readonly string[];

function encodeZero(s: string): string {
  return s.split(ZERO).join(ZERO_ESCAPE);
}

function decodeZero(s: string): string {
  return s.split(ZERO_ESCAPE).join(ZERO);
}

function checkToken(token: unknown, index: number): string {
  if (typeof token !== "string") {
    throw new QueryValidationError(`token ${index} must be a string`, token);
  }
  if (token.includes(SLOT_SEP) || token.includes(COLOCATED_SEP)) {
    throw new QueryValidationError(
      `token ${JSON.stringify(token)} cannot contain "${SLOT_SEP}" or "${COLOCATED_SEP}"`,
      token,
    );
  }
  return token;
}

/**
 * Tokens handed straight to the full-text tokenizer, bypassing its own
 * splitting of the phrase text. Use it in place of a phrase's text:
 *
 *     new QueryTokens(["hello", ["first", "1st"]])
 *
 * encodes to `$!Tokens~hello|first>1st`. A tokenizer that understands the
 * marker returns these tokens as-is.
 */
export class QueryTokens {
  readonly tokens: readonly TokenSlot[];

  constructor(tokens: readonly TokenSlot[]) {
    if (tokens.length === 0) {
      throw new QueryValidationError("QueryTokens needs at least one token", tokens);
    }
    this.tokens = tokens.map((slot, i) => {
      if (typeof slot === "string") return checkToken(slot, i);
      if (slot.length === 0) {
        throw new QueryValidationError(`token slot ${i} has no co-located tokens`, slot);
      }
      return slot.map((t) => checkToken(t, i));
    });
  }

  encode(): string {
    const slots = this.tokens.map((slot) =>
      typeof slot === "string"
        ? encodeZero(slot)
        : slot.map(encodeZero).join(COLOCATED_SEP),
    );
    return QUERY_TOKENS_MARKER + slots.join(SLOT_SEP);
  }

  /**
   * Returns the tokens carried by `data`, or null when it does not start with
   * the marker. Bytes are read as UTF-8.
   */
  static decode(data: string | Uint8Array): QueryTokens | null {
    const text = typeof data === "string" ? data : new TextDecoder().decode(data);
    if (!text.startsWith(QUERY_TOKENS_MARKER)) return null;

    const slots = text.slice(QUERY_TOKENS_MARKER.length).split(SLOT_SEP).map((slot): TokenSlot =>
      slot.includes(COLOCATED_SEP)
        ? slot.split(COLOCATED_SEP).map(decodeZero)
        : decodeZero(slot),
    );
    return new QueryTokens(slots);
  }

  toJSON(): string {
    return this.encode();
  }
}
