/**
 * Expression dataset JSON types
 *
 * The document an expression data provider exports: cell types, element ids,
 * a sparse mean-expression matrix, seeds and mature sequences.
 */

import { type } from "arktype";

/**
 * Schema for the dataset document
 *
 * @example
 * ```json
 * {
 *   "cell_types": ["Heart", "Kidney", "Liver"],
 *   "mirnas": ["hsa-miR-1-3p"],
 *   "mean_matrix": { "hsa-miR-1-3p": { "Heart": 1500, "Kidney": 1200 } },
 *   "mir_to_seed": { "hsa-miR-1-3p": "GGAAUGU" },
 *   "mature_seqs": { "hsa-miR-1-3p": "UGGAAUGUAAAGAAGUAUGUAU" }
 * }
 * ```
 */
export const ExpressionDocumentSchema = type({
  cell_types: "string[]",
  mirnas: "string[]",
  mean_matrix: {
    "[string]": {
      "[string]": "number>=0",
    },
  },
  mir_to_seed: {
    "[string]": "string",
  },
  mature_seqs: {
    "[string]": "string",
  },
});

export type ExpressionDocument = typeof ExpressionDocumentSchema.infer;
