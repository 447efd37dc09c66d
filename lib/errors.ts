import { SimpleError } from './util/flow';

/**
 * A source file that the graph refers to is not on disk (anymore)
 */
export class MissingSourceError extends SimpleError {
  constructor(public readonly sourcePath: string) {
    super(`Source is missing: ${sourcePath}`);
  }
}

export class SourceNotFoundError extends SimpleError {
  constructor(public readonly sourceName: string, searched: string[]) {
    super(`Failed to find source file '${sourceName}' (searched: ${searched.join(', ')})`);
  }
}

export class AmbiguousSourceError extends SimpleError {
  constructor(public readonly sourceName: string, public readonly candidates: string[]) {
    super(`Ambiguous file pattern - found multiple source files named '${sourceName}': ${candidates.join(', ')}`);
  }
}

export class InvalidArtifactNameError extends SimpleError {
  constructor(public readonly artifactName: string, reason: string) {
    super(`Invalid artifact name '${artifactName}': ${reason}`);
  }
}

/**
 * A toolchain command exited with a non-zero status
 *
 * The status becomes the exit status of the whole run.
 */
export class ToolchainFailureError extends SimpleError {
  constructor(public readonly exitCode: number, public readonly command: string) {
    super(`Command failed with exit status ${exitCode}: ${command}`);
  }
}

/**
 * Exit status of the process after a run that failed with the given error
 */
export function exitStatusOf(e: unknown): number {
  return e instanceof ToolchainFailureError ? e.exitCode : 1;
}
