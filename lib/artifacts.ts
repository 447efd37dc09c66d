/**
 * Actions that can be performed over the artifact graph
 *
 * There is one operation per kind of artifact. Traversal order is decided
 * by the artifacts; the visitor only decides what to do with each node.
 */
export interface ArtifactVisitor {
  visitSource(source: SourceArtifact): void | Promise<void>;
  visitObject(obj: ObjectArtifact): void | Promise<void>;
  visitStaticLibrary(library: StaticLibraryArtifact): void | Promise<void>;
  visitSharedLibrary(library: SharedLibraryArtifact): void | Promise<void>;
  visitExecutable(executable: ExecutableArtifact): void | Promise<void>;
}

/**
 * A node in the build graph, identified by its location on disk
 */
export abstract class Artifact {
  constructor(public readonly path: string) {
  }

  /**
   * Identity of this artifact in sets and maps
   */
  public get key(): string {
    return this.path;
  }

  public equals(other: Artifact) {
    return this.key === other.key;
  }

  /**
   * Artifacts this one is built from, in the order the toolchain receives them
   */
  public abstract dependencies(): readonly Artifact[];

  /**
   * Visit all dependencies, then present this artifact to the visitor
   *
   * Shared dependencies are visited once for every path that reaches them;
   * it's up to the visitor to skip the ones it has already seen.
   */
  public abstract accept(visitor: ArtifactVisitor): Promise<void>;

  public toString() {
    return this.path;
  }

  protected async acceptDependencies(visitor: ArtifactVisitor) {
    for (const dep of this.dependencies()) {
      await dep.accept(visitor);
    }
  }
}

export class SourceArtifact extends Artifact {
  public dependencies(): readonly Artifact[] {
    return [];
  }

  public async accept(visitor: ArtifactVisitor) {
    await visitor.visitSource(this);
  }
}

export class ObjectArtifact extends Artifact {
  private readonly deps: readonly Artifact[];

  constructor(path: string, public readonly source: SourceArtifact) {
    super(path);
    this.deps = Object.freeze([source]);
  }

  public dependencies() {
    return this.deps;
  }

  public async accept(visitor: ArtifactVisitor) {
    await this.acceptDependencies(visitor);
    await visitor.visitObject(this);
  }
}

export abstract class LibraryArtifact extends Artifact {
  public readonly objects: readonly ObjectArtifact[];

  constructor(path: string, objects: ObjectArtifact[]) {
    super(path);
    this.objects = Object.freeze([...objects]);
  }

  public dependencies(): readonly Artifact[] {
    return this.objects;
  }

  public async accept(visitor: ArtifactVisitor) {
    await this.acceptDependencies(visitor);
    await this.visitLibrary(visitor);
  }

  protected abstract visitLibrary(visitor: ArtifactVisitor): void | Promise<void>;
}

export class StaticLibraryArtifact extends LibraryArtifact {
  protected visitLibrary(visitor: ArtifactVisitor) {
    return visitor.visitStaticLibrary(this);
  }
}

export class SharedLibraryArtifact extends LibraryArtifact {
  protected visitLibrary(visitor: ArtifactVisitor) {
    return visitor.visitSharedLibrary(this);
  }
}

/**
 * A program, linked from objects and (directly compiled) sources
 */
export class ExecutableArtifact extends Artifact {
  public readonly deps: ReadonlyArray<ObjectArtifact | SourceArtifact>;

  constructor(path: string, deps: Array<ObjectArtifact | SourceArtifact>) {
    super(path);
    this.deps = Object.freeze([...deps]);
  }

  public dependencies() {
    return this.deps;
  }

  public async accept(visitor: ArtifactVisitor) {
    await this.acceptDependencies(visitor);
    await visitor.visitExecutable(this);
  }
}
