import fs from 'fs/promises';
import { AppConfig } from '../config/app.js';
import { parseCsvRecords, stripBom } from '../utils/csv.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export interface GlossaryEntry {
  term: string;
  definition: string;
}

/**
 * Render entries as prompt bullets, one `- term: definition` per line
 */
export function formatGlossary(entries: GlossaryEntry[]): string {
  return entries.map((entry) => `- ${entry.term}: ${entry.definition}`).join('\n');
}

/**
 * Glossary Loader
 *
 * Reads the two-column (term, definition) reference CSV of internal terms.
 * The rendered text is computed on first use and kept for the lifetime of
 * the loader; a failed load is remembered as "" and never retried.
 */
export class GlossaryLoader {
  private readonly filePath: string;
  private textPromise: Promise<string> | null = null;
  private logger = createLogger('GlossaryLoader');

  constructor(filePath: string = AppConfig.getGlossaryPath()) {
    this.filePath = filePath;
  }

  /**
   * Read and parse the glossary file. The header row is skipped.
   *
   * @throws when the file cannot be read
   */
  async load(): Promise<GlossaryEntry[]> {
    const content = await fs.readFile(this.filePath, 'utf-8');
    const [, ...records] = parseCsvRecords(stripBom(content));

    const entries: GlossaryEntry[] = [];
    for (const record of records) {
      if (record.length < 2) {
        this.logger.debug('Skipping glossary row without a definition', { record });
        continue;
      }
      entries.push({ term: record[0].trim(), definition: record[1].trim() });
    }
    return entries;
  }

  /**
   * Glossary rendered for prompt inclusion; "" when the file is unavailable
   */
  getText(): Promise<string> {
    if (!this.textPromise) {
      this.textPromise = this.loadText();
    }
    return this.textPromise;
  }

  private async loadText(): Promise<string> {
    try {
      const entries = await this.load();
      this.logger.info(`Loaded ${entries.length} glossary terms`, { filePath: this.filePath });
      return formatGlossary(entries);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.warn(`Glossary file not found at '${this.filePath}'. Proceeding without it.`);
      } else {
        this.logger.warn(`Failed to load glossary file. Proceeding without it.`, {
          filePath: this.filePath,
          error: errorMessage(error),
        });
      }
      return '';
    }
  }
}
