import * as log from '../util/log';
import { loadProject } from '../project';
import { ICommandRunner, ShellCommandRunner } from '../util/shell';

export interface BuildOptions {
  readonly projectFile?: string;

  /**
   * @default true
   */
  readonly debug?: boolean;

  /**
   * Runs the toolchain commands
   *
   * @default - the system shell, from the project directory
   */
  readonly runner?: ICommandRunner;
}

/**
 * Bring all targets of the project up to date
 *
 * Returns the paths of the rebuilt artifacts.
 */
export async function build(options: BuildOptions = {}): Promise<readonly string[]> {
  const start = Date.now();
  const { graph, toolchain } = await loadProject(options);

  log.info(`${graph.roots.length} targets (${graph.debug ? 'debug' : 'release'})`);
  const visitor = await graph.build(toolchain, options.runner ?? new ShellCommandRunner(graph.rootDirectory));

  const delta = (Date.now() - start) / 1000;
  if (visitor.rebuilt.length === 0) {
    log.info(`Everything up to date (${delta.toFixed(1)}s)`);
  } else {
    log.info(`${visitor.rebuilt.length} artifacts rebuilt (${delta.toFixed(1)}s)`);
  }
  return visitor.rebuilt;
}
