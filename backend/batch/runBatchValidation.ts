#!/usr/bin/env node
import 'dotenv/config';
import fs from 'node:fs/promises';
import path from 'node:path';

import {
  asInt,
  clampConcurrency,
  loadValidatorConfig,
  type ValidatorConfig,
} from '../config/validatorConfig';
import { asValidatorError, TemplateParseError } from '../reliability/ValidatorError';
import { telemetry } from '../telemetry/Telemetry';
import { loadEmbeddedTemplate, loadTemplate } from '../template/TemplateLoader';
import type { SubmissionTemplate } from '../template/SubmissionTemplate';
import { runBatchValidation } from './BatchValidationRunner';

export const EXIT_TEMPLATE_ERROR = 2;

const USAGE = `Usage: csv-submission-validate [options]

  --template <file>     Template JSON (default: VALIDATOR_TEMPLATE_PATH or the embedded template)
  --input <dir>         Folder with CSV files (default: VALIDATOR_INPUT_DIR or input_source)
  --output <dir>        Folder for reports (default: VALIDATOR_OUTPUT_DIR or output)
  --concurrency <n>     Files validated in parallel, 1-32 (default: 4)
  --dashboard           Also write an HTML dashboard per file
  --summary-only        Print one line per file instead of the full report
  --no-text             Do not write <name>_report.txt files
  --help                Show this message`;

export type CliArgs = {
  templatePath: string | null;
  inputDir: string;
  outputDir: string;
  concurrency: number;
  dashboard: boolean;
  summaryOnly: boolean;
  writeText: boolean;
  help: boolean;
};

/**
 * `--key value` pairs and bare `--flag`s; flags win over the environment.
 */
export const parseCliArgs = (argv: readonly string[], config: ValidatorConfig): CliArgs => {
  const map = new Map<string, string>();
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith('--')) continue;
    const key = token.slice(2);
    const next = argv[i + 1];
    if (next === undefined || next.startsWith('--')) {
      map.set(key, 'true');
    } else {
      map.set(key, next);
      i += 1;
    }
  }

  const valueOf = (key: string): string | null => {
    const v = map.get(key);
    return v === undefined || v === 'true' ? null : v;
  };

  return {
    templatePath: valueOf('template') ?? config.templatePath,
    inputDir: valueOf('input') ?? config.inputDir,
    outputDir: valueOf('output') ?? config.outputDir,
    concurrency: clampConcurrency(asInt(map.get('concurrency'), config.concurrency)),
    dashboard: map.has('dashboard') || config.writeDashboard,
    summaryOnly: map.has('summary-only'),
    writeText: !map.has('no-text'),
    help: map.has('help'),
  };
};

export async function loadTemplateFile(filePath: string): Promise<SubmissionTemplate> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new TemplateParseError(`Could not read template file ${filePath}.`, [], err);
  }
  return loadTemplate(text);
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  const args = parseCliArgs(argv, loadValidatorConfig());
  if (args.help) {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    return 0;
  }

  let template: SubmissionTemplate;
  try {
    template = args.templatePath
      ? await loadTemplateFile(path.resolve(args.templatePath))
      : loadEmbeddedTemplate();
  } catch (err) {
    const failure = asValidatorError(err);
    // eslint-disable-next-line no-console
    console.error(`Template could not be loaded: ${failure.message}`);
    if (failure instanceof TemplateParseError) {
      for (const issue of failure.issues) {
        // eslint-disable-next-line no-console
        console.error(`  - ${issue}`);
      }
    }
    return EXIT_TEMPLATE_ERROR;
  }

  telemetry.record({
    name: 'template.loaded',
    tags: {
      source: args.templatePath ? 'external' : 'embedded',
      templateId: template.templateId,
      templateVersion: template.templateVersion,
    },
    metrics: { columns: template.columns.length },
  });

  const result = await runBatchValidation({
    template,
    inputDir: path.resolve(args.inputDir),
    outputDir: path.resolve(args.outputDir),
    concurrency: args.concurrency,
    writeText: args.writeText,
    writeDashboard: args.dashboard,
    summaryOnly: args.summaryOnly,
  });
  return result.exitCode;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      // eslint-disable-next-line no-console
      console.error(
        JSON.stringify({
          type: 'validator.fatal',
          errorMessage: err instanceof Error ? err.message : String(err),
        }),
      );
      process.exitCode = 1;
    });
}
