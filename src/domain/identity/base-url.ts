import { z } from "zod";
import { ValidationError } from "../../core/errors.js";
import { LexicalValue } from "../value-objects/lexical-value.js";

const HttpUrlSchema = z
  .string()
  .url()
  .refine((url) => /^https?:\/\//i.test(url), "must use http or https");

/** The URL harvesters send OAI-PMH requests to. */
export class BaseURL extends LexicalValue {
  constructor(url: string) {
    const result = HttpUrlSchema.safeParse(url);
    if (!result.success) {
      throw new ValidationError(
        "InvalidFormat",
        "base URL",
        url,
        result.error.issues.map((i) => i.message).join("; "),
      );
    }
    super(url);
  }
}
