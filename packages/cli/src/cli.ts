import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { CheckCommand } from './commands/check.js';
import { GenerateCommand } from './commands/generate.js';

export const DEFAULT_OUT_DIR = 'gen/ui/schema';

export interface CliOptions {
  argv?: string[];
  exitProcess?: boolean;
  log?: (message: string) => void;
  error?: (message: string) => void;
  /** Receives each command's exit status. Defaults to setting `process.exitCode`. */
  onExit?: (code: number) => void;
}

export function buildCli(options: CliOptions = {}) {
  const {
    argv = hideBin(process.argv),
    exitProcess = false,
    log = console.log,
    error = console.error,
    onExit = (code: number) => {
      process.exitCode = code;
    },
  } = options;

  const output = { log, error };
  const generateCommand = new GenerateCommand(output);
  const checkCommand = new CheckCommand(output);

  return yargs(argv)
    .scriptName('ontoform')
    .usage('Usage: $0 <command> [options]')
    .version()
    .alias('v', 'version')
    .help('h')
    .alias('h', 'help')
    .wrap(null)
    .strictCommands()
    .demandCommand(1, 'Please specify a command')
    .exitProcess(exitProcess)
    .command(
      'generate <ontology>',
      'Compile an ontology into UI schema documents\n',
      (yargsGenerate) => {
        return yargsGenerate
          .positional('ontology', {
            describe: 'Ontology file (YAML, or JSON by extension)',
            type: 'string',
            demandOption: true,
          })
          .option('out', {
            describe: 'Directory the schema documents are written to',
            type: 'string',
            default: DEFAULT_OUT_DIR,
          })
          .option('layouts', {
            describe: 'JSON layout catalog replacing the bundled one',
            type: 'string',
          })
          .example(
            '$0 generate ontology.yaml --out gen/ui/schema',
            'Write one schema per entity plus the enum catalog'
          );
      },
      (argv) => {
        onExit(generateCommand.run(argv));
      }
    )
    .command(
      'check <ontology>',
      'Verify the generated schema documents are up to date\n',
      (yargsCheck) => {
        return yargsCheck
          .positional('ontology', {
            describe: 'Ontology file (YAML, or JSON by extension)',
            type: 'string',
            demandOption: true,
          })
          .option('out', {
            describe: 'Directory holding the generated schema documents',
            type: 'string',
            default: DEFAULT_OUT_DIR,
          })
          .option('layouts', {
            describe: 'JSON layout catalog replacing the bundled one',
            type: 'string',
          })
          .example('$0 check ontology.yaml', 'Fail when the schemas drifted');
      },
      (argv) => {
        onExit(checkCommand.run(argv));
      }
    );
}
