import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { z } from 'zod';
import {
  ConfigurationError,
  LLMClient,
  NamingAgent,
  PDFExtractor,
  Renamer,
  discoverPdfs,
  getErrorMessage,
  isPdfRenamerError,
  loadConfig,
  runPipeline,
} from '@pdf-renamer/core';
import type {
  FileResult,
  PdfRenamerError,
  PipelineServices,
  RenamerConfig,
  RunSummary,
  SourceFile,
} from '@pdf-renamer/core';
import { loadEnvFile } from './env-loader';

export const EXIT_OK = 0;
export const EXIT_FILE_FAILURES = 1;
export const EXIT_FATAL = 2;

export type ServiceOptions = {
  datePrefix: boolean;
};

export type CliDependencies = {
  /** Environment to read configuration from (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Directory the default .env is looked up in (default: process.cwd()) */
  cwd?: string;
  createServices?: (config: RenamerConfig, options: ServiceOptions) => PipelineServices;
};

export const USAGE = `Usage: pdf-renamer <file-or-directory> [options]

Renames PDFs after their content, using an Azure OpenAI chat model.

Options:
  -r, --recursive        Also process PDFs in subdirectories
  -n, --dry-run          Show the new names without renaming anything
      --no-date          Do not prefix names with the document date
      --env-file <path>  Load settings from this .env file (default: ./.env)
  -h, --help             Show this help message
  -v, --version          Show the version

Environment:
  AZURE_OPENAI_API_KEY, AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_DEPLOYMENT,
  AZURE_OPENAI_API_VERSION, AZURE_OPENAI_MODEL (all required)
  PDF_RENAMER_MAX_RETRIES, PDF_RENAMER_TIMEOUT_MS (optional)`;

export function createDefaultServices(config: RenamerConfig, options: ServiceOptions): PipelineServices {
  return {
    extractor: new PDFExtractor(),
    namer: new NamingAgent(new LLMClient(config), { datePrefix: options.datePrefix }),
    renamer: new Renamer(),
  };
}

function readVersion(): string {
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  const pkg = z.object({ version: z.string() }).parse(JSON.parse(fs.readFileSync(packageJsonPath, 'utf8')));
  return pkg.version;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      recursive: { type: 'boolean', short: 'r', default: false },
      'dry-run': { type: 'boolean', short: 'n', default: false },
      'no-date': { type: 'boolean', default: false },
      'env-file': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
  });
}

/**
 * Render one file's outcome as a console line.
 */
export function formatResult(result: FileResult): string {
  const source = path.basename(result.file.path);
  const target = result.targetPath ? path.basename(result.targetPath) : '';

  switch (result.status) {
    case 'renamed':
      return `Renamed: ${source} -> ${target}`;
    case 'named':
      return `Preview: ${source} -> ${target}`;
    case 'unchanged':
      return `Unchanged: ${source}`;
    case 'failed':
      return `Failed: ${source} (${result.failure?.kind ?? 'UnexpectedError'}: ${result.failure?.message ?? 'unknown error'})`;
    default:
      return `${result.status}: ${source}`;
  }
}

export function formatFatalError(error: PdfRenamerError): string {
  return error instanceof ConfigurationError ? `Configuration error: ${error.message}` : error.message;
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    `Renamed ${summary.renamed}, previewed ${summary.previewed}, unchanged ${summary.unchanged}, failed ${summary.failed}`,
  ];
  for (const result of summary.results) {
    if (result.status === 'failed') {
      lines.push(`  ${result.file.path}: ${result.failure?.kind ?? 'UnexpectedError'}: ${result.failure?.message ?? ''}`);
    }
  }
  return lines;
}

/**
 * Run the command line. Resolves to the process exit code:
 * 0 all files processed, 1 at least one file failed, 2 fatal error.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const cwd = deps.cwd ?? process.cwd();
  const createServices = deps.createServices ?? createDefaultServices;

  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(`[Main] ${getErrorMessage(error)}`);
    console.error(USAGE);
    return EXIT_FATAL;
  }

  if (args.values.help) {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (args.values.version) {
    console.log(readVersion());
    return EXIT_OK;
  }
  if (args.positionals.length !== 1) {
    console.error('[Main] Expected exactly one file or directory argument');
    console.error(USAGE);
    return EXIT_FATAL;
  }

  const inputPath = args.positionals[0];
  const dryRun = args.values['dry-run'];

  let files: SourceFile[];
  let config: RenamerConfig;
  try {
    const envFile = args.values['env-file'];
    if (envFile !== undefined) {
      const resolved = path.resolve(cwd, envFile);
      if (loadEnvFile([resolved], env) === null) {
        throw new ConfigurationError(`Env file not found: ${resolved}`);
      }
    } else {
      loadEnvFile([path.join(cwd, '.env')], env);
    }
    config = loadConfig(env);
    files = await discoverPdfs(path.resolve(cwd, inputPath), { recursive: args.values.recursive });
  } catch (error) {
    if (isPdfRenamerError(error) && error.fatal) {
      console.error(`[Main] ${formatFatalError(error)}`);
      return EXIT_FATAL;
    }
    throw error;
  }

  if (files.length === 0) {
    console.log(`[Main] No PDF files found in ${inputPath}`);
    return EXIT_OK;
  }

  const services = createServices(config, { datePrefix: !args.values['no-date'] });
  const summary = await runPipeline(files, services, {
    dryRun,
    onResult: (result) => console.log(formatResult(result)),
  });

  for (const line of formatSummary(summary)) {
    console.log(line);
  }

  return summary.failed > 0 ? EXIT_FILE_FAILURES : EXIT_OK;
}
