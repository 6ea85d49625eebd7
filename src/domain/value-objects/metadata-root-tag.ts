import { LexicalValue, assertPattern } from "./lexical-value.js";

const NAME = "[A-Za-z_][A-Za-z0-9_.-]*";

/** Optionally qualified element name: `local` or `prefix:local`. */
export const ROOT_TAG_PATTERN = new RegExp(`^${NAME}(?::${NAME})?$`);

/** The root element of a metadata payload, e.g. `oai_dc:dc`. */
export class MetadataRootTag extends LexicalValue {
  constructor(rootTag: string) {
    assertPattern(ROOT_TAG_PATTERN, "metadata root tag", rootTag);
    super(rootTag);
  }

  /** Namespace prefix of the tag, or `null` when unqualified. */
  get prefix(): string | null {
    const colon = this.value.indexOf(":");
    return colon === -1 ? null : this.value.slice(0, colon);
  }

  get localName(): string {
    return this.value.slice(this.value.indexOf(":") + 1);
  }
}
