#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { getSchemaByName, listSchemaNames } from './config/recordSchema';
import { loadSchemaFile, SchemaDefinitionError } from './config/schemaDefinition';
import { resolveDelimiter } from './parsers/csvParser';
import { appendRunLog } from './report/runLog';
import { renderValidationReport } from './report/validationReport';
import { Schema, ValidateOptions } from './types/schema';
import { DEFAULT_ENCODING, validateCsvSchema } from './validation/validateCsv';

export const EXIT_VALID = 0;
export const EXIT_INVALID = 1;
export const EXIT_USAGE = 2;

export interface CliOutput {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

interface ValidateCommandOptions {
  schema?: string;
  schemaName?: string;
  delimiter: string;
  encoding: string;
  maxErrors?: number;
  maxDetails: number;
  verbose?: boolean;
  json?: boolean;
  logFile?: string;
}

const defaultOutput: CliOutput = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
};

function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value) || parseInt(value, 10) === 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parseInt(value, 10);
}

function resolveSchema(options: ValidateCommandOptions): Schema {
  if (options.schema && options.schemaName) {
    throw new SchemaDefinitionError('Use either --schema or --schema-name, not both');
  }
  if (options.schema) {
    return loadSchemaFile(options.schema).schema;
  }
  if (options.schemaName) {
    const schema = getSchemaByName(options.schemaName);
    if (!schema) {
      throw new SchemaDefinitionError(
        `Unknown schema '${options.schemaName}'. Available: ${listSchemaNames().join(', ')}`
      );
    }
    return schema;
  }
  throw new SchemaDefinitionError('A schema is required: pass --schema <file> or --schema-name <name>');
}

function runValidate(file: string, options: ValidateCommandOptions, output: CliOutput): number {
  let schema: Schema;
  try {
    schema = resolveSchema(options);
  } catch (err) {
    if (err instanceof SchemaDefinitionError) {
      output.stderr(`error: ${err.message}\n`);
      return EXIT_USAGE;
    }
    throw err;
  }

  const validateOptions: ValidateOptions = {
    encoding: options.encoding,
    delimiter: resolveDelimiter(file, options.delimiter, options.encoding),
  };
  if (options.maxErrors !== undefined) validateOptions.maxErrors = options.maxErrors;

  const result = validateCsvSchema(file, schema, validateOptions);

  if (options.json) {
    output.stdout(JSON.stringify(result, null, 2) + '\n');
  } else {
    output.stdout(
      renderValidationReport(result, { verbose: options.verbose, maxDetails: options.maxDetails }) + '\n'
    );
  }

  if (options.logFile) {
    appendRunLog(options.logFile, result);
  }

  return result.valid ? EXIT_VALID : EXIT_INVALID;
}

export function buildProgram(output: CliOutput, onExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('csv-validate')
    .description('Validate a delimited text file against a column schema')
    .version('1.0.0')
    .argument('<file>', 'CSV/TSV file to validate')
    .option('-s, --schema <path>', 'JSON schema definition file')
    .option('-n, --schema-name <name>', `built-in schema (${listSchemaNames().join(', ')})`)
    .option('-d, --delimiter <char>', "field delimiter, 'tab' or 'auto'", ',')
    .option('-e, --encoding <label>', 'text encoding of the file', DEFAULT_ENCODING)
    .option('-m, --max-errors <n>', 'stop after this many errors', parsePositiveInt)
    .option('--max-details <n>', 'errors listed in verbose mode', parsePositiveInt, 100)
    .option('-v, --verbose', 'list individual errors')
    .option('--json', 'print the result as JSON instead of a report')
    .option('--log-file <path>', 'append a one-line summary of the run to this file')
    .configureOutput({
      writeOut: output.stdout,
      writeErr: output.stderr,
    })
    .exitOverride()
    .action((file: string, options: ValidateCommandOptions) => {
      onExitCode(runValidate(file, options, output));
    });

  return program;
}

/**
 * Run the CLI on user arguments (without node and script path) and return the exit code.
 */
export function runCli(args: string[], output: CliOutput = defaultOutput): number {
  let exitCode = EXIT_VALID;
  const program = buildProgram(output, code => {
    exitCode = code;
  });

  try {
    program.parse(args, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version end with exit code 0; everything else is a usage error
      return err.exitCode === 0 ? EXIT_VALID : EXIT_USAGE;
    }
    throw err;
  }
  return exitCode;
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
