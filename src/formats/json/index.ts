/**
 * Expression dataset JSON format
 */

export { deserializeExpressionDocument } from "./morphs";
export { ExpressionDatasetParser, loadExpressionDataset, parseExpressionDataset } from "./parser";
export type { ExpressionDocument } from "./types";
export { ExpressionDocumentSchema } from "./types";
