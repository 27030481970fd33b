import fs from 'fs/promises';
import { AnalysisResult, ANALYSIS_FIELDS, FeatureClassifier, NOT_APPLICABLE } from '../analyzer/types.js';
import { CsvTable, getCell, readCsvTable, writeCsvTable } from '../utils/csv.js';
import { InputFileNotFoundError } from '../utils/errors.js';
import { RunLogger } from '../utils/logger.js';

export const SKIPPED_REASONING = 'Skipped: Empty feature description.';

/**
 * Summary of one screening run
 */
export interface BatchSummary {
  totalRows: number;
  analyzed: number;
  flagged: number;
  skipped: number;
  failed: number;
  outputPath: string;
}

export function skippedResult(): AnalysisResult {
  return {
    is_geo_compliance_needed: null,
    reasoning: SKIPPED_REASONING,
    relevant_regulation: NOT_APPLICABLE,
  };
}

/**
 * Render an analysis value as a CSV cell: true/false, empty for null
 */
function formatFlag(value: boolean | null): string {
  return value === null ? '' : String(value);
}

/**
 * Cells appended to a feature record, in ANALYSIS_FIELDS order
 */
export function analysisCells(result: AnalysisResult): string[] {
  return [formatFlag(result.is_geo_compliance_needed), result.reasoning, result.relevant_regulation];
}

/**
 * Compliance Batch Runner
 *
 * Screens every row of a feature CSV, strictly in input order with one
 * backend call at a time, and writes the augmented CSV once all rows are done.
 */
export class ComplianceBatchRunner {
  private classifier: FeatureClassifier;
  private logger: RunLogger;

  constructor(classifier: FeatureClassifier, runId: string = 'geo-compliance') {
    this.classifier = classifier;
    this.logger = new RunLogger(runId);
  }

  /**
   * Run the screening
   *
   * @throws InputFileNotFoundError when the input CSV does not exist; no output is written
   */
  async run(inputPath: string, outputPath: string): Promise<BatchSummary> {
    const logger = this.logger.withContext({ inputPath, outputPath });
    logger.started();

    try {
      const table = await this.loadFeatures(inputPath, logger);
      const total = table.records.length;
      const summary: BatchSummary = {
        totalRows: total,
        analyzed: 0,
        flagged: 0,
        skipped: 0,
        failed: 0,
        outputPath,
      };

      logger.info(`Starting analysis of ${total} features...`);

      // Input columns that share a name with an analysis column are replaced by it
      const keptIndices = table.fields.flatMap((field, index) => (isAnalysisField(field) ? [] : [index]));
      const fields = [...keptIndices.map((index) => table.fields[index]), ...ANALYSIS_FIELDS];
      const results: string[][] = [];

      for (const [index, record] of table.records.entries()) {
        const featureName = getCell(table, record, 'feature_name') || NOT_APPLICABLE;
        const description = getCell(table, record, 'feature_description');

        logger.info(`[${index + 1}/${total}] Analyzing feature: '${featureName}'...`);

        let result: AnalysisResult;
        if (!description.trim()) {
          logger.info(`  -> Skipping feature '${featureName}' due to empty description.`);
          result = skippedResult();
          summary.skipped++;
        } else {
          result = await this.classifier.classify(description);
          if (result.is_geo_compliance_needed === null) {
            summary.failed++;
          } else {
            summary.analyzed++;
            if (result.is_geo_compliance_needed) {
              summary.flagged++;
            }
          }
        }

        results.push([...keptIndices.map((i) => record[i]), ...analysisCells(result)]);
      }

      await writeCsvTable(outputPath, fields, results);

      logger.completed({ ...summary });
      return summary;
    } catch (error) {
      logger.failed(error);
      throw error;
    }
  }

  private async loadFeatures(inputPath: string, logger: RunLogger): Promise<CsvTable> {
    try {
      await fs.access(inputPath);
    } catch {
      throw new InputFileNotFoundError(inputPath);
    }

    const table = await readCsvTable(inputPath);

    for (const required of ['feature_name', 'feature_description']) {
      if (!table.fields.includes(required)) {
        logger.warn(`Input CSV has no '${required}' column; treating it as empty`);
      }
    }

    return table;
  }
}

function isAnalysisField(field: string): boolean {
  return (ANALYSIS_FIELDS as readonly string[]).includes(field);
}
