import * as child_process from 'child_process';
import * as os from 'os';
import * as log from './log';

/**
 * A toolchain invocation that produces a single artifact
 */
export interface BuildCommand {
  /**
   * The file the command produces
   */
  readonly target: string;

  /**
   * The files the command reads, in command line order
   */
  readonly inputs: string[];

  /**
   * The full shell command line
   */
  readonly commandLine: string;
}

export interface ICommandRunner {
  /**
   * Run the command to completion and return its exit status
   */
  run(command: BuildCommand): Promise<number>;
}

/**
 * Runs commands through the system shell, sharing our stdio
 */
export class ShellCommandRunner implements ICommandRunner {
  constructor(private readonly cwd?: string) {
  }

  public run(command: BuildCommand): Promise<number> {
    log.debug(`[${this.cwd ?? process.cwd()}] ${command.commandLine}`);

    return new Promise((ok, ko) => {
      const child = child_process.spawn(command.commandLine, {
        cwd: this.cwd,
        shell: true,
        stdio: 'inherit',
      });
      child.once('error', ko);
      child.once('close', (code, signal) => {
        if (code !== null) {
          ok(code);
        } else {
          ok(signalExitStatus(signal));
        }
      });
    });
  }
}

/**
 * Exit status a POSIX shell reports for a process killed by a signal
 */
function signalExitStatus(signal: NodeJS.Signals | null) {
  const signum = Object.entries(os.constants.signals).find(([name]) => name === signal)?.[1];
  return signum !== undefined ? 128 + signum : 1;
}
