import { promises as fs } from 'fs';
import * as log from '../util/log';
import { loadProject } from '../project';
import { LineSink } from '../visitors/graphviz-visitor';

export interface GraphOptions {
  readonly projectFile?: string;
  readonly debug?: boolean;

  /**
   * File to write the DOT graph to
   *
   * @default - stdout
   */
  readonly output?: string;
}

export async function graph(options: GraphOptions = {}) {
  const project = await loadProject(options);

  const lines = new Array<string>();
  const sink: LineSink = options.output !== undefined
    ? (line) => lines.push(line)
    : (line) => process.stdout.write(line + '\n');

  await project.graph.writeGraphviz(sink);

  if (options.output !== undefined) {
    await fs.writeFile(options.output, lines.join('\n') + '\n', { encoding: 'utf-8' });
    log.info(`Wrote ${options.output}`);
  }
}
