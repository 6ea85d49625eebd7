import { ValidationError } from "../../core/errors.js";
import { LexicalValue } from "../value-objects/lexical-value.js";

export const SUPPORTED_PROTOCOL_VERSION = "2.0";

export class ProtocolVersion extends LexicalValue {
  constructor(version: string = SUPPORTED_PROTOCOL_VERSION) {
    if (version !== SUPPORTED_PROTOCOL_VERSION) {
      throw new ValidationError(
        "InvalidFormat",
        "protocol version",
        version,
        `only "${SUPPORTED_PROTOCOL_VERSION}" is supported`,
      );
    }
    super(version);
  }
}
