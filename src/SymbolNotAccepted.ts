'use strict';

/**
 * A typed character that is not part of the input alphabet.
 */
class SymbolNotAccepted extends Error {
  public readonly character: string;

  constructor (character: string) {
    super(`TM doesn't accept symbol: ${character}`);

    this.name = 'SymbolNotAccepted';
    this.character = character;

    // https://github.com/Microsoft/TypeScript-wiki/blob/master/Breaking-Changes.md#extending-built-ins-like-error-array-and-map-may-no-longer-work
    Object.setPrototypeOf(this, SymbolNotAccepted.prototype);
  }
}

export default SymbolNotAccepted;
