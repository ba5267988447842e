#!/usr/bin/env node
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import { Argv, Options } from 'yargs';
import { ok, Result } from 'neverthrow';
import {
  CommandName,
  OUTPUT_FORMATS,
  runCommand,
} from './commands';
import { loadConfig } from './config';
import { logger, useColors } from './debug';
import { AutomatonError } from './errors';
import {
  AUTOMATON_FIELDS,
  GRAMMAR_FIELDS,
  loadRecord,
  PDA_FIELDS,
} from './input/records';

interface CommandSpec {
  name: CommandName;
  describe: string;
  fields: readonly string[];
  /** Whether --input runs the resulting DFA */
  simulates: boolean;
}

const COMMANDS: readonly CommandSpec[] = [
  {
    name: 'dfa',
    describe: 'validate and draw a DFA',
    fields: AUTOMATON_FIELDS,
    simulates: true,
  },
  {
    name: 'nfa',
    describe: 'convert an NFA to a DFA by subset construction',
    fields: AUTOMATON_FIELDS,
    simulates: true,
  },
  {
    name: 'enfa',
    describe: 'convert an ε-NFA to a DFA by subset construction',
    fields: AUTOMATON_FIELDS,
    simulates: true,
  },
  {
    name: 'grammar',
    describe: 'convert a right-linear grammar to a DFA',
    fields: GRAMMAR_FIELDS,
    simulates: true,
  },
  {
    name: 'pda',
    describe: 'validate and draw a pushdown automaton',
    fields: PDA_FIELDS,
    simulates: false,
  },
  {
    name: 'dfa-to-grammar',
    describe: 'convert a DFA to a right-linear grammar',
    fields: AUTOMATON_FIELDS,
    simulates: false,
  },
];

const COMMON_OPTIONS: Record<string, Options> = {
  record: {
    type: 'string',
    describe: 'JSON file holding the record fields',
  },
  format: {
    choices: OUTPUT_FORMATS,
    default: 'table',
    describe: 'output format',
  },
  'label-prefix': {
    type: 'string',
    describe: 'prefix of the states built by subset construction',
  },
  debug: {
    type: 'boolean',
    describe: 'print debug logs',
  },
};

function fieldOptions(spec: CommandSpec): Record<string, Options> {
  const options: Record<string, Options> = {};
  for (const field of spec.fields) {
    options[field] = { type: 'string', describe: `the ${field} field` };
  }
  if (spec.simulates) {
    options.input = {
      type: 'string',
      describe: 'string to run the resulting DFA on',
    };
  }
  return options;
}

function stringOption(
  argv: { readonly [key: string]: unknown },
  key: string
): string | undefined {
  const value = argv[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * The record to run a command on: the --record file, with any field given
 * as a flag taking precedence.
 */
function readRecord(
  spec: CommandSpec,
  argv: { readonly [key: string]: unknown }
): Result<unknown, AutomatonError> {
  const flags: Record<string, string> = {};
  for (const field of spec.fields) {
    const value = stringOption(argv, field);
    if (value !== undefined) {
      flags[field] = value;
    }
  }
  const file = stringOption(argv, 'record');
  if (file === undefined) {
    return ok(flags);
  }
  return loadRecord(file).map((value) =>
    typeof value === 'object' && value !== null && !Array.isArray(value)
      ? { ...value, ...flags }
      : value
  );
}

function execute(
  spec: CommandSpec,
  argv: { readonly [key: string]: unknown }
) {
  const config = loadConfig();
  logger.configure({
    debug: argv.debug === true || config.debug,
    debugFile: config.debugFile,
  });
  useColors(config.colors && process.stdout.isTTY === true);

  const output = readRecord(spec, argv).andThen((record) =>
    runCommand(spec.name, record, {
      format: OUTPUT_FORMATS.find((f) => f === argv.format) ?? 'table',
      input: spec.simulates ? stringOption(argv, 'input') : undefined,
      labelPrefix: stringOption(argv, 'label-prefix') ?? config.labelPrefix,
    })
  );
  if (output.isErr()) {
    console.error(`${output.error.kind}: ${output.error.message}`);
    process.exitCode = 1;
    return;
  }
  process.stdout.write(output.value);
}

export function createParser(args: string[]): Argv {
  let parser: Argv = yargs(args);
  for (const spec of COMMANDS) {
    parser = parser.command(
      spec.name,
      spec.describe,
      (y) => y.options(fieldOptions(spec)).options(COMMON_OPTIONS),
      (argv) => execute(spec, argv)
    );
  }
  return parser.demandCommand(1).strict().help();
}

if (require.main === module) {
  createParser(hideBin(process.argv)).parseSync();
}
