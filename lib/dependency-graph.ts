import * as path from 'path';
import * as log from './util/log';
import {
  Artifact, ArtifactVisitor, ExecutableArtifact, ObjectArtifact,
  SharedLibraryArtifact, SourceArtifact, StaticLibraryArtifact,
} from './artifacts';
import { AmbiguousSourceError, InvalidArtifactNameError, SourceNotFoundError } from './errors';
import { IToolchain } from './toolchain';
import { findFilesMatching, isProperChildOf } from './util/files';
import { ICommandRunner } from './util/shell';
import { BuildVisitor } from './visitors/build-visitor';
import { GraphvizRootArtifact, GraphvizVisitor, LineSink } from './visitors/graphviz-visitor';

/**
 * Where things live, relative to the project root
 */
export interface ProjectLayout {
  readonly sourceDir: string;
  readonly testDir: string;
  readonly objectDir: string;
  readonly binDir: string;
  readonly testBinDir: string;
}

export const DEFAULT_LAYOUT: ProjectLayout = {
  sourceDir: 'src',
  testDir: 'test',
  objectDir: 'obj',
  binDir: 'bin',
  testBinDir: path.join('test', 'bin'),
};

export interface DependencyGraphOptions {
  /**
   * Debug build (objects under `<objectDir>/dbg`) or release build (`<objectDir>/rls`)
   *
   * @default true
   */
  readonly debug?: boolean;

  readonly layout?: Partial<ProjectLayout>;

  /**
   * @default .c
   */
  readonly sourceSuffix?: string;

  /**
   * @default .o
   */
  readonly objectSuffix?: string;
}

/**
 * Turns artifact names into a graph of artifacts
 *
 * Every name is resolved once: asking for the same name again returns the
 * same instance, so artifacts shared between targets are shared in the graph.
 */
export class DependencyGraph {
  public readonly rootDirectory: string;
  public readonly debug: boolean;

  private readonly srcDir: string;
  private readonly testDir: string;
  private readonly objDir: string;
  private readonly binDir: string;
  private readonly testBinDir: string;
  private readonly sourceSuffix: string;
  private readonly objectSuffix: string;

  private readonly sources = new Map<string, Promise<SourceArtifact>>();
  private readonly objects = new Map<string, Promise<ObjectArtifact>>();
  private readonly staticLibraries = new Map<string, Promise<StaticLibraryArtifact>>();
  private readonly sharedLibraries = new Map<string, Promise<SharedLibraryArtifact>>();
  private readonly executables = new Map<string, Promise<ExecutableArtifact>>();
  private readonly _roots = new Array<Artifact>();

  // Different names may resolve to the same file (`str.c`, `util/str.c`)
  private readonly sourcesByPath = new Map<string, SourceArtifact>();
  private readonly objectsByPath = new Map<string, ObjectArtifact>();

  constructor(rootDirectory: string, options: DependencyGraphOptions = {}) {
    const layout = { ...DEFAULT_LAYOUT, ...options.layout };

    this.rootDirectory = path.resolve(rootDirectory);
    this.debug = options.debug ?? true;
    this.srcDir = path.join(this.rootDirectory, layout.sourceDir);
    this.testDir = path.join(this.rootDirectory, layout.testDir);
    this.objDir = path.join(this.rootDirectory, layout.objectDir, this.debug ? 'dbg' : 'rls');
    this.binDir = path.join(this.rootDirectory, layout.binDir);
    this.testBinDir = path.join(this.rootDirectory, layout.testBinDir);
    this.sourceSuffix = options.sourceSuffix ?? '.c';
    this.objectSuffix = options.objectSuffix ?? '.o';
  }

  /**
   * Registered build targets, in registration order
   */
  public get roots(): readonly Artifact[] {
    return this._roots;
  }

  public async addStaticLibrary(name: string, ...objectNames: string[]) {
    return this.addRoot(await this.staticLibrary(name, ...objectNames));
  }

  public async addSharedLibrary(name: string, ...objectNames: string[]) {
    return this.addRoot(await this.sharedLibrary(name, ...objectNames));
  }

  public async addExecutable(name: string, ...depNames: string[]) {
    return this.addRoot(await this.executable(name, ...depNames));
  }

  /**
   * Walk every root with the given visitor
   */
  public async accept(visitor: ArtifactVisitor) {
    for (const artifact of this._roots) {
      await artifact.accept(visitor);
    }
  }

  public async build(toolchain: IToolchain, runner: ICommandRunner): Promise<BuildVisitor> {
    const visitor = new BuildVisitor(toolchain, runner);
    await this.accept(visitor);
    return visitor;
  }

  public async writeGraphviz(sink: LineSink) {
    const root = new GraphvizRootArtifact(this.rootDirectory, [...this._roots], sink);
    await root.accept(new GraphvizVisitor(sink));
  }

  /**
   * Forget all resolved artifacts and registered roots
   */
  public reset() {
    this.sources.clear();
    this.objects.clear();
    this.staticLibraries.clear();
    this.sharedLibraries.clear();
    this.executables.clear();
    this.sourcesByPath.clear();
    this.objectsByPath.clear();
    this._roots.splice(0, this._roots.length);
  }

  public source(name: string): Promise<SourceArtifact> {
    return lookupOrElse(this.sources, name, async () =>
      canonical(this.sourcesByPath, new SourceArtifact(await this.findSourcePath(name))));
  }

  public object(name: string): Promise<ObjectArtifact> {
    return lookupOrElse(this.objects, name, async () => {
      if (!name.endsWith(this.objectSuffix) || name.length === this.objectSuffix.length) {
        throw new InvalidArtifactNameError(name, `object names must end in '${this.objectSuffix}'`);
      }
      const baseName = name.slice(0, name.length - this.objectSuffix.length);
      const src = await this.source(baseName + this.sourceSuffix);

      const tree = isProperChildOf(src.path, this.srcDir) ? this.srcDir : this.testDir;
      const relSource = path.relative(tree, src.path);
      const relObject = relSource.slice(0, relSource.length - this.sourceSuffix.length) + this.objectSuffix;
      return canonical(this.objectsByPath, new ObjectArtifact(path.join(this.objDir, relObject), src));
    });
  }

  public staticLibrary(name: string, ...objectNames: string[]): Promise<StaticLibraryArtifact> {
    return lookupOrElse(this.staticLibraries, name, async () =>
      new StaticLibraryArtifact(path.join(this.binDir, name), await this.objectsNamed(objectNames)));
  }

  public sharedLibrary(name: string, ...objectNames: string[]): Promise<SharedLibraryArtifact> {
    return lookupOrElse(this.sharedLibraries, name, async () =>
      new SharedLibraryArtifact(path.join(this.binDir, name), await this.objectsNamed(objectNames)));
  }

  public executable(name: string, ...depNames: string[]): Promise<ExecutableArtifact> {
    return lookupOrElse(this.executables, name, async () => {
      const deps = new Array<ObjectArtifact | SourceArtifact>();
      for (const depName of depNames) {
        deps.push(depName.endsWith(this.sourceSuffix)
          ? await this.source(depName)
          : await this.object(depName));
      }
      return new ExecutableArtifact(path.join(this.testBinDir, name), deps);
    });
  }

  private addRoot<A extends Artifact>(artifact: A): A {
    if (this._roots.includes(artifact)) {
      log.warning(`Target registered more than once: ${artifact.path}`);
    }
    log.debug(`Target: ${artifact.path}`);
    this._roots.push(artifact);
    return artifact;
  }

  private async objectsNamed(names: string[]) {
    const ret = new Array<ObjectArtifact>();
    for (const name of names) {
      ret.push(await this.object(name));
    }
    return ret;
  }

  private async findSourcePath(name: string): Promise<string> {
    let results = await findFilesMatching(this.srcDir, name);
    if (results.length === 0) {
      // Try test dir instead
      results = await findFilesMatching(this.testDir, name);
    }
    if (results.length === 0) {
      throw new SourceNotFoundError(name, [this.srcDir, this.testDir]);
    }
    if (results.length > 1) {
      throw new AmbiguousSourceError(name, results);
    }
    return results[0];
  }
}

function canonical<A extends Artifact>(byPath: Map<string, A>, artifact: A): A {
  const existing = byPath.get(artifact.key);
  if (existing !== undefined) { return existing; }
  byPath.set(artifact.key, artifact);
  return artifact;
}

/**
 * Cache the promise, not the value, so that we don't resolve a name twice
 */
function lookupOrElse<A>(cache: Map<string, Promise<A>>, name: string, make: () => Promise<A>): Promise<A> {
  let ret = cache.get(name);
  if (ret === undefined) {
    ret = make();
    cache.set(name, ret);
  }
  return ret;
}
