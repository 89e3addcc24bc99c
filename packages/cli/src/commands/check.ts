import * as path from 'path';
import {
  checkDrift,
  hasDrift,
  OntologyCompiler,
  renderDocuments,
  type DriftReport,
} from '@ontoform/core';
import {
  readLayouts,
  readOntologyFile,
  reportError,
  type CommandOutput,
} from './helpers.js';

export interface CheckArgs {
  ontology: string;
  out: string;
  layouts?: string;
}

const DRIFT_KINDS: ReadonlyArray<keyof DriftReport> = [
  'missing',
  'changed',
  'extra',
];

export class CheckCommand {
  constructor(private readonly output: CommandOutput) {}

  /**
   * Compile in memory and compare with what `out` holds. Nothing is written.
   *
   * @returns 0 when the directory is current, 1 on drift or error
   */
  run({ ontology, out, layouts }: CheckArgs): number {
    try {
      const compiler = new OntologyCompiler({ layouts: readLayouts(layouts) });
      const { content, format } = readOntologyFile(ontology);
      const files = renderDocuments(compiler.compileSource(content, format));
      const report = checkDrift(path.resolve(out), files);

      if (!hasDrift(report)) {
        this.output.log(`ontoform: ${files.length} schemas up to date in ${out}`);
        return 0;
      }

      this.output.error(`ontoform: schemas in ${out} are out of date`);
      for (const kind of DRIFT_KINDS) {
        for (const name of report[kind]) {
          this.output.error(`  ${kind}: ${path.join(out, name)}`);
        }
      }
      this.output.error(`Run "ontoform generate ${ontology} --out ${out}" to update them.`);
      return 1;
    } catch (error) {
      return reportError(error, this.output);
    }
  }
}
