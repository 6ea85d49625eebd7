import { LexicalValue, assertNotBlank } from "./lexical-value.js";

/**
 * Unique identifier of an item in the repository. Opaque to the protocol;
 * only a blank identifier is rejected.
 */
export class RecordIdentifier extends LexicalValue {
  constructor(identifier: string) {
    assertNotBlank("record identifier", identifier);
    super(identifier);
  }
}
