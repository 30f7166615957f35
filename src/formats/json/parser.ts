/**
 * Expression dataset parser
 *
 * Turns the provider's JSON document into the matrix and catalog the
 * selector consumes. Uses ArkType morphs internally for validation.
 */

import { type } from "arktype";
import { ParseError } from "../../errors";
import { readToString } from "../../io/file-reader";
import { ownValue, recordFromEntries } from "../../operations/core/records";
import type { ExpressionDataset, FileReaderOptions } from "../../types";
import { deserializeExpressionDocument } from "./morphs";
import type { ExpressionDocument } from "./types";

/** How many ids a warning lists before truncating */
const WARNING_ID_LIMIT = 5;

/**
 * Parser for expression dataset documents
 *
 * @example
 * ```typescript
 * const parser = new ExpressionDatasetParser();
 * const dataset = await parser.parseFile('mirna_data.json');
 * console.log(`${dataset.catalog.elements.length} miRNAs x ${dataset.cellTypes.length} cell types`);
 * ```
 */
export class ExpressionDatasetParser {
  /**
   * Read and parse a dataset file
   *
   * @throws {FileError} When the file cannot be read
   * @throws {ParseError} When the JSON is malformed or inconsistent
   */
  async parseFile(path: string, options?: FileReaderOptions): Promise<ExpressionDataset> {
    const content = await readToString(path, options);
    return this.parseString(content);
  }

  /**
   * Parse a dataset from JSON text
   *
   * Elements without a mature sequence are kept (they can still be selected)
   * and reported with a warning.
   *
   * @throws {ParseError} When the JSON is malformed, fails schema validation,
   * lists an element twice, or references an unknown cell type
   */
  parseString(content: string): ExpressionDataset {
    const document = deserializeExpressionDocument(content);

    if (document instanceof type.errors) {
      throw new ParseError(`Expression dataset validation failed: ${document.summary}`, "JSON");
    }

    return this.toDataset(document);
  }

  private toDataset(document: ExpressionDocument): ExpressionDataset {
    const cellTypes = new Set(document.cell_types);
    const elements = document.mirnas;

    const seen = new Set<string>();
    for (const elementId of elements) {
      if (seen.has(elementId)) {
        throw new ParseError(`Element '${elementId}' is listed more than once`, "JSON");
      }
      seen.add(elementId);
    }

    const matrixEntries: [string, Record<string, number>][] = [];
    for (const [elementId, row] of Object.entries(document.mean_matrix)) {
      for (const cellType of Object.keys(row)) {
        if (!cellTypes.has(cellType)) {
          throw new ParseError(
            `Expression for '${elementId}' references unknown cell type '${cellType}'`,
            "JSON"
          );
        }
      }
      matrixEntries.push([elementId, recordFromEntries(Object.entries(row))]);
    }

    const seedEntries: [string, string][] = [];
    const sequenceEntries: [string, string][] = [];
    const missingSequences: string[] = [];

    for (const elementId of elements) {
      const seed = ownValue(document.mir_to_seed, elementId);
      if (seed !== undefined) {
        seedEntries.push([elementId, seed]);
      }
      const matureSeq = ownValue(document.mature_seqs, elementId);
      if (matureSeq === undefined || matureSeq === "") {
        missingSequences.push(elementId);
      } else {
        sequenceEntries.push([elementId, matureSeq]);
      }
    }

    if (missingSequences.length > 0) {
      const listed = missingSequences.slice(0, WARNING_ID_LIMIT).join(", ");
      const more =
        missingSequences.length > WARNING_ID_LIMIT
          ? ` and ${missingSequences.length - WARNING_ID_LIMIT} more`
          : "";
      console.warn(
        `Expression dataset: ${missingSequences.length} element(s) have no mature sequence: ${listed}${more}`
      );
    }

    return {
      cellTypes: [...document.cell_types],
      matrix: recordFromEntries(matrixEntries),
      catalog: {
        elements: [...elements],
        seeds: recordFromEntries(seedEntries),
        matureSeqs: recordFromEntries(sequenceEntries),
      },
    };
  }
}

/**
 * Parse a dataset from JSON text
 *
 * @throws {ParseError} See {@link ExpressionDatasetParser.parseString}
 */
export function parseExpressionDataset(content: string): ExpressionDataset {
  return new ExpressionDatasetParser().parseString(content);
}

/**
 * Read and parse a dataset file
 *
 * @throws {FileError} When the file cannot be read
 * @throws {ParseError} When the document is malformed or inconsistent
 */
export function loadExpressionDataset(
  path: string,
  options?: FileReaderOptions
): Promise<ExpressionDataset> {
  return new ExpressionDatasetParser().parseFile(path, options);
}
