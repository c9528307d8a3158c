import type { ContainerToken } from "./reader.js";

export type ResyncDecision = {
  /** The token with the spurious bytes removed. */
  token: ContainerToken;
  /** Where a fresh stream should start. */
  restartAt: number;
};

/**
 * Recognizes a token that shows the stream has drifted and says how to realign.
 * Returning undefined means the token is fine as is.
 */
export interface Resynchronizer {
  readonly name: string;
  inspect(token: ContainerToken): ResyncDecision | undefined;
}

export const noResync: Resynchronizer = {
  name: "none",
  inspect: () => undefined,
};

/**
 * A string whose declared length swallowed the next key's length byte ends in a
 * character below 32. Drop it and restart on that byte.
 */
export const trailingControlByteResync: Resynchronizer = {
  name: "trailing-control-byte",
  inspect(token) {
    if (token.kind !== "string" || token.value.length === 0) {
      return undefined;
    }
    if (token.value.charCodeAt(token.value.length - 1) >= 32) {
      return undefined;
    }
    return {
      token: { ...token, value: token.value.slice(0, -1) },
      restartAt: token.cursor - 1,
    };
  },
};
