/**
 * Expression dataset deserialization morphs
 *
 * "Parse, don't validate": JSON text goes in, a schema-checked document
 * comes out (or ArkType errors).
 */

import { type } from "arktype";
import { ExpressionDocumentSchema } from "./types";

export const deserializeExpressionDocument = type("string.json.parse").pipe(
  ExpressionDocumentSchema
);
