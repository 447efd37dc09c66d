import * as path from 'path';
import * as log from './util/log';
import { DependencyGraph } from './dependency-graph';
import { ProjectJson, ProjectSchema, TargetDefinition, targetRepr } from './project-schema';
import { GccToolchain } from './toolchain';
import { findFileUp, readJson } from './util/files';
import { SimpleError } from './util/flow';

export const PROJECT_FILE = 'cbuild.json';

export interface Project {
  readonly projectFile: string;
  readonly graph: DependencyGraph;
  readonly toolchain: GccToolchain;
}

export interface LoadProjectOptions {
  /**
   * Explicit project file; searched upwards from the working directory if not given
   */
  readonly projectFile?: string;

  /**
   * @default true
   */
  readonly debug?: boolean;
}

export async function findProjectFile(startDir: string): Promise<string> {
  const ret = await findFileUp(PROJECT_FILE, startDir);
  if (ret === undefined) {
    throw new SimpleError(`'${PROJECT_FILE}' not found upwards from '${startDir}'`);
  }
  return ret;
}

/**
 * Read a project file and register all of its targets with a fresh graph
 *
 * Name resolution happens here, so a misnamed or ambiguous source fails
 * before anything gets built.
 */
export async function loadProject(options: LoadProjectOptions = {}): Promise<Project> {
  const projectFile = path.resolve(options.projectFile ?? await findProjectFile(process.cwd()));
  const projectJson = parseProjectJson(await readJson(projectFile), projectFile);
  const debug = options.debug ?? true;

  const graph = new DependencyGraph(path.dirname(projectFile), { debug, layout: projectJson.layout });
  for (const target of projectJson.targets) {
    await addTarget(graph, target);
  }

  const toolchain = new GccToolchain({ ...projectJson.toolchain, debug });
  log.debug(`Loaded ${projectJson.targets.length} targets from ${projectFile}`);
  return { projectFile, graph, toolchain };
}

async function addTarget(graph: DependencyGraph, target: TargetDefinition) {
  log.debug(`Resolving ${targetRepr(target)}`);
  switch (target.type) {
    case 'static-library': return graph.addStaticLibrary(target.name, ...target.objects);
    case 'shared-library': return graph.addSharedLibrary(target.name, ...target.objects);
    case 'executable': return graph.addExecutable(target.name, ...target.dependencies);
  }
}

/**
 * Validate the shape of a parsed project file
 *
 * Reports the first problem, naming the offending field.
 */
export function parseProjectJson(x: unknown, fileName: string): ProjectJson {
  const result = ProjectSchema.safeParse(x);
  if (result.success) { return result.data; }

  const issue = result.error.issues[0];
  const where = formatPath(issue.path);
  throw new SimpleError(`${fileName}: ${where ? `${where}: ` : ''}${issue.message}`);
}

/**
 * Render an issue path as `targets[0].name`
 */
function formatPath(issuePath: Array<string | number>) {
  return issuePath.map((p, i) => typeof p === 'number' ? `[${p}]` : (i > 0 ? `.${p}` : p)).join('');
}
