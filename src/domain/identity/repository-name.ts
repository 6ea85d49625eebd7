import { LexicalValue, assertNotBlank } from "../value-objects/lexical-value.js";

/** Human-readable name of the repository, shown by Identify. */
export class RepositoryName extends LexicalValue {
  constructor(name: string) {
    assertNotBlank("repository name", name);
    super(name);
  }
}
