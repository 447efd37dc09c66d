import * as path from 'path';
import * as log from '../util/log';
import {
  Artifact, ArtifactVisitor, ExecutableArtifact, ObjectArtifact,
  SharedLibraryArtifact, SourceArtifact, StaticLibraryArtifact,
} from '../artifacts';
import { MissingSourceError, ToolchainFailureError } from '../errors';
import { IToolchain } from '../toolchain';
import { ensureDirectory, exists, modificationTime } from '../util/files';
import { BuildCommand, ICommandRunner } from '../util/shell';

type MakeCommand = (target: string, deps: string[]) => BuildCommand;

/**
 * Brings every visited artifact up to date with its dependencies
 *
 * Each artifact is checked (and if necessary rebuilt) at most once per
 * visitor, no matter how many parents reach it.
 */
export class BuildVisitor implements ArtifactVisitor {
  private readonly visited = new Set<string>();
  private readonly _rebuilt = new Array<string>();

  constructor(private readonly toolchain: IToolchain, private readonly runner: ICommandRunner) {
  }

  /**
   * Paths of the artifacts that were rebuilt, in build order
   */
  public get rebuilt(): readonly string[] {
    return this._rebuilt;
  }

  public async visitSource(source: SourceArtifact) {
    if (!this.firstVisit(source)) { return; }

    if (!await exists(source.path)) {
      throw new MissingSourceError(source.path);
    }
  }

  public async visitObject(obj: ObjectArtifact) {
    await this.buildIfStale(obj, (t, d) => this.toolchain.compileObject(t, d));
  }

  public async visitStaticLibrary(library: StaticLibraryArtifact) {
    await this.buildIfStale(library, (t, d) => this.toolchain.archiveStaticLibrary(t, d));
  }

  public async visitSharedLibrary(library: SharedLibraryArtifact) {
    await this.buildIfStale(library, (t, d) => this.toolchain.linkSharedLibrary(t, d));
  }

  public async visitExecutable(executable: ExecutableArtifact) {
    await this.buildIfStale(executable, (t, d) => this.toolchain.linkExecutable(t, d));
  }

  private firstVisit(artifact: Artifact) {
    if (this.visited.has(artifact.key)) { return false; }
    this.visited.add(artifact.key);
    return true;
  }

  private async buildIfStale(artifact: Artifact, makeCommand: MakeCommand) {
    if (!this.firstVisit(artifact)) { return; }

    if (!await isStale(artifact)) {
      log.debug(`Up to date: ${artifact.path}`);
      return;
    }

    await makeParentDirectory(artifact);
    const command = makeCommand(artifact.path, artifact.dependencies().map(d => d.path));

    log.command(command.commandLine);
    const status = await this.runner.run(command);
    if (status !== 0) {
      throw new ToolchainFailureError(status, command.commandLine);
    }
    this._rebuilt.push(artifact.path);
  }
}

/**
 * Whether an artifact is missing or older than any of its dependencies
 */
export async function isStale(artifact: Artifact): Promise<boolean> {
  const targetTime = await modificationTime(artifact.path);
  if (targetTime === undefined) { return true; }

  for (const dep of artifact.dependencies()) {
    const depTime = await modificationTime(dep.path);
    if (depTime === undefined || depTime > targetTime) {
      return true;
    }
  }
  return false;
}

async function makeParentDirectory(artifact: Artifact) {
  const directory = path.dirname(artifact.path);
  if (await ensureDirectory(directory)) {
    log.info(`Created directory: ${directory}`);
  }
}
