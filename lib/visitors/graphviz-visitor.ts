import * as path from 'path';
import {
  Artifact, ArtifactVisitor, ExecutableArtifact, LibraryArtifact, ObjectArtifact,
  SharedLibraryArtifact, SourceArtifact, StaticLibraryArtifact,
} from '../artifacts';

/**
 * Receives the diagram one line at a time
 */
export type LineSink = (line: string) => void;

/**
 * Entry point for rendering a set of root artifacts as a single digraph
 *
 * Not a real build node: it has no dependencies and is never built, it only
 * opens and closes the graph block around its children.
 */
export class GraphvizRootArtifact extends Artifact {
  public readonly artifacts: readonly Artifact[];

  constructor(path: string, artifacts: Artifact[], private readonly sink: LineSink) {
    super(path);
    this.artifacts = Object.freeze([...artifacts]);
  }

  public dependencies(): readonly Artifact[] {
    return [];
  }

  public async accept(visitor: ArtifactVisitor) {
    this.sink('digraph {');
    for (const artifact of this.artifacts) {
      await artifact.accept(visitor);
    }
    this.sink('}');
  }
}

/**
 * Writes node and edge declarations in Graphviz DOT syntax
 *
 * Every distinct node is declared once, every distinct (parent, child) edge
 * is drawn once.
 */
export class GraphvizVisitor implements ArtifactVisitor {
  private readonly ids = new Map<string, string>();
  private readonly usedIds = new Set<string>();
  private readonly edges = new Set<string>();

  constructor(private readonly sink: LineSink) {
  }

  public visitSource(source: SourceArtifact) {
    this.printNode(source);
  }

  public visitObject(obj: ObjectArtifact) {
    this.printNode(obj);
    this.printEdge(obj, obj.source);
  }

  public visitStaticLibrary(library: StaticLibraryArtifact) {
    this.visitLibrary(library);
  }

  public visitSharedLibrary(library: SharedLibraryArtifact) {
    this.visitLibrary(library);
  }

  public visitExecutable(executable: ExecutableArtifact) {
    this.printNode(executable);
    for (const dep of executable.deps) {
      this.printEdge(executable, dep);
    }
  }

  private visitLibrary(library: LibraryArtifact) {
    this.printNode(library);
    for (const obj of library.objects) {
      this.printEdge(library, obj);
    }
  }

  private printNode(artifact: Artifact) {
    if (this.ids.has(artifact.key)) { return; }
    this.sink(`  ${this.idOf(artifact)} [label="${escapeLabel(artifact.path)}"]`);
  }

  private printEdge(from: Artifact, to: Artifact) {
    const key = JSON.stringify([from.key, to.key]);
    if (this.edges.has(key)) { return; }
    this.edges.add(key);
    this.sink(`  ${this.idOf(from)} -> ${this.idOf(to)}`);
  }

  /**
   * Identifier of an artifact in this graph
   *
   * Distinct artifacts whose file names sanitize to the same identifier get a
   * numeric suffix.
   */
  private idOf(artifact: Artifact) {
    const existing = this.ids.get(artifact.key);
    if (existing !== undefined) { return existing; }

    const base = nodeId(artifact);
    let id = base;
    for (let n = 2; this.usedIds.has(id); n++) {
      id = `${base}_${n}`;
    }
    this.ids.set(artifact.key, id);
    this.usedIds.add(id);
    return id;
  }
}

/**
 * DOT identifier for an artifact, derived from its file name
 *
 * Not unique on its own; the visitor disambiguates.
 */
export function nodeId(artifact: Artifact) {
  const id = path.basename(artifact.path).replace(/[^A-Za-z0-9_]/g, '_');
  return /^[0-9]/.test(id) ? `_${id}` : id;
}

function escapeLabel(s: string) {
  return s.replace(/[\\"]/g, '\\$&');
}
