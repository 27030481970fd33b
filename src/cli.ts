#!/usr/bin/env node

import fs from 'fs';
import { pathToFileURL } from 'url';
import { ComplianceAnalyzer } from './analyzer/ComplianceAnalyzer.js';
import { AppConfig } from './config/app.js';
import { OpenAIConfig } from './config/openai.js';
import { BatchSummary, ComplianceBatchRunner } from './core/ComplianceBatchRunner.js';
import { GlossaryLoader } from './glossary/GlossaryLoader.js';
import { InputFileNotFoundError, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

/**
 * CLI for Geo-Compliance Feature Screening
 *
 * Usage:
 *   npm run dev -- [--input <path>] [--output <path>]
 */

export interface CliOptions {
  input: string;
  output: string;
  help: boolean;
}

/**
 * Parse command line flags. Accepts `--flag value` and `--flag=value`.
 *
 * @throws Error on unknown flags or a flag without a value
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    input: AppConfig.DEFAULT_INPUT_PATH,
    output: AppConfig.DEFAULT_OUTPUT_PATH,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h' || arg === 'help') {
      options.help = true;
      continue;
    }

    const [flag, inlineValue] = arg.startsWith('--') && arg.includes('=')
      ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
      : [arg, undefined];

    if (flag !== '--input' && flag !== '--output') {
      throw new Error(`Unknown argument: ${arg}`);
    }

    const value = inlineValue ?? args[++i];
    if (!value) {
      throw new Error(`Missing value for ${flag}`);
    }

    if (flag === '--input') {
      options.input = value;
    } else {
      options.output = value;
    }
  }

  return options;
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Geo-Compliance Feature Screening

Analyze feature descriptions for geo-specific compliance requirements.

USAGE:
  npm run dev -- [options]

OPTIONS:
  --input <path>     Path to the input CSV file. (default: ${AppConfig.DEFAULT_INPUT_PATH})
  --output <path>    Path to the output CSV file. (default: ${AppConfig.DEFAULT_OUTPUT_PATH})
  --help             Show this help message

INPUT:
  CSV with a header row and the columns feature_name and feature_description.
  Other columns are copied to the output unchanged.

ENVIRONMENT:
  Configuration is loaded from .env file
    - COMPLIANCE_BACKEND   openai | ollama (default: openai)
    - OPENAI_API_KEY       required for the openai backend
    - OPENAI_MODEL         default: gpt-4-turbo
    - OLLAMA_BASE_URL      default: http://localhost:11434
    - OLLAMA_MODEL         default: deepseek-r1
    - GLOSSARY_PATH        default: ${AppConfig.DEFAULT_GLOSSARY_PATH}
    - LOG_LEVEL            default: info
`);
}

function printSummary(summary: BatchSummary): void {
  console.log('\n✅ Analysis complete!\n');
  console.log(`Total features: ${summary.totalRows}`);
  console.log(`Analyzed: ${summary.analyzed} (${summary.flagged} need geo-specific compliance)`);
  console.log(`Skipped: ${summary.skipped}`);
  console.log(`Failed: ${summary.failed}`);
  console.log(`\nResults saved to '${summary.outputPath}'\n`);
}

/**
 * Main CLI entry point
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    printHelp();
    return 1;
  }

  if (options.help) {
    printHelp();
    return 0;
  }

  try {
    // Reset client caches to pick up any .env changes
    OpenAIConfig.resetClient();

    const glossary = new GlossaryLoader();
    const analyzer = ComplianceAnalyzer.create(glossary);
    const runner = new ComplianceBatchRunner(analyzer);

    const summary = await runner.run(options.input, options.output);
    printSummary(summary);
    return 0;
  } catch (error) {
    if (error instanceof InputFileNotFoundError) {
      logger.error(`Error: ${error.message}`, { inputPath: error.filePath });
    } else {
      logger.error('An unexpected error occurred', { error: errorMessage(error) });
    }
    console.error('\n❌ Run failed:', errorMessage(error));
    return 1;
  }
}

/**
 * True when this module is the process entry point (also through an npm bin symlink)
 */
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Run CLI
if (isEntryPoint()) {
  main().then((code) => {
    process.exitCode = code;
  }, (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
