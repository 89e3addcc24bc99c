import * as path from 'path';
import {
  OntologyCompiler,
  renderDocuments,
  writeDocuments,
} from '@ontoform/core';
import {
  readLayouts,
  readOntologyFile,
  reportError,
  type CommandOutput,
} from './helpers.js';

export interface GenerateArgs {
  ontology: string;
  out: string;
  layouts?: string;
}

export class GenerateCommand {
  constructor(private readonly output: CommandOutput) {}

  /**
   * Compile the ontology and write every schema document into `out`.
   *
   * @returns the process exit status
   */
  run({ ontology, out, layouts }: GenerateArgs): number {
    try {
      const compiler = new OntologyCompiler({ layouts: readLayouts(layouts) });
      const { content, format } = readOntologyFile(ontology);
      const result = compiler.compileSource(content, format);

      writeDocuments(path.resolve(out), renderDocuments(result), {
        log: this.output.log,
        displayDir: out,
      });

      this.output.log(
        `ontoform: generated ${result.schemas.length} entity schemas + 1 enums schema`
      );
      return 0;
    } catch (error) {
      return reportError(error, this.output);
    }
  }
}
