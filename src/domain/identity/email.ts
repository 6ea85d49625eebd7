import { z } from "zod";
import { ValidationError } from "../../core/errors.js";
import { LexicalValue } from "../value-objects/lexical-value.js";

const EmailSchema = z.string().email();

/** Administrator contact address. */
export class Email extends LexicalValue {
  constructor(email: string) {
    if (!EmailSchema.safeParse(email).success) {
      throw new ValidationError("InvalidFormat", "email", email, "not an e-mail address");
    }
    super(email);
  }
}
