import { BuildCommand } from './util/shell';

/**
 * Synthesizes the command that builds an artifact from its dependencies
 */
export interface IToolchain {
  compileObject(target: string, deps: string[]): BuildCommand;
  archiveStaticLibrary(target: string, deps: string[]): BuildCommand;
  linkSharedLibrary(target: string, deps: string[]): BuildCommand;
  linkExecutable(target: string, deps: string[]): BuildCommand;
}

export interface GccToolchainOptions {
  /**
   * C compiler (also used as linker)
   *
   * @default gcc
   */
  readonly cc?: string;

  /**
   * Archiver for static libraries
   *
   * @default ar
   */
  readonly ar?: string;

  /**
   * Debug or release flags
   *
   * @default true
   */
  readonly debug?: boolean;

  /**
   * Extra compiler flags, appended to the configuration's own
   */
  readonly cflags?: string[];

  /**
   * Extra flags for linking shared libraries and executables
   */
  readonly ldflags?: string[];
}

const WARNING_FLAGS = ['-Wall'];

export class GccToolchain implements IToolchain {
  private readonly cc: string;
  private readonly ar: string;
  private readonly cflags: string[];
  private readonly ldflags: string[];

  constructor(options: GccToolchainOptions = {}) {
    this.cc = options.cc ?? 'gcc';
    this.ar = options.ar ?? 'ar';
    this.cflags = [
      ...((options.debug ?? true) ? ['-g'] : ['-O2']),
      ...WARNING_FLAGS,
      ...(options.cflags ?? []),
    ];
    this.ldflags = options.ldflags ?? [];
  }

  public compileObject(target: string, deps: string[]) {
    return command(target, deps, [this.cc, ...this.cflags, '-o', target, '-c', ...deps]);
  }

  public archiveStaticLibrary(target: string, deps: string[]) {
    return command(target, deps, [this.ar, 'rcs', target, ...deps]);
  }

  public linkSharedLibrary(target: string, deps: string[]) {
    return command(target, deps, [this.cc, '-shared', '-fPIC', ...WARNING_FLAGS, '-o', target, ...deps, ...this.ldflags]);
  }

  public linkExecutable(target: string, deps: string[]) {
    return command(target, deps, [this.cc, ...this.cflags, '-o', target, ...deps, ...this.ldflags]);
  }
}

function command(target: string, inputs: string[], words: string[]): BuildCommand {
  return { target, inputs, commandLine: words.join(' ') };
}
