import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BuildCommand, ICommandRunner } from '../lib/util/shell';

/**
 * A throwaway project directory
 */
export class TestProject {
  public static create() {
    return new TestProject(fs.mkdtempSync(path.join(os.tmpdir(), 'cbuild-test-')));
  }

  private constructor(public readonly root: string) {
  }

  public path(relPath: string) {
    return path.join(this.root, relPath);
  }

  /**
   * Write a file (if it doesn't exist yet) and set its modification time in seconds since the epoch
   */
  public touch(relPath: string, mtimeS: number) {
    const fullPath = this.path(relPath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    if (!fs.existsSync(fullPath)) {
      fs.writeFileSync(fullPath, '', { encoding: 'utf-8' });
    }
    fs.utimesSync(fullPath, mtimeS, mtimeS);
    return fullPath;
  }

  public exists(relPath: string) {
    return fs.existsSync(this.path(relPath));
  }

  public cleanup() {
    fs.rmSync(this.root, { recursive: true, force: true });
  }
}

/**
 * Records commands instead of running them, and produces their targets
 */
export class FakeRunner implements ICommandRunner {
  public readonly commands = new Array<BuildCommand>();
  private readonly failures = new Map<string, number>();

  /**
   * Make the command producing the given target exit with the given status
   */
  public failOn(target: string, status: number) {
    this.failures.set(target, status);
  }

  public get targets() {
    return this.commands.map(c => c.target);
  }

  public async run(command: BuildCommand): Promise<number> {
    this.commands.push(command);
    const status = this.failures.get(command.target);
    if (status !== undefined) { return status; }

    fs.writeFileSync(command.target, command.commandLine, { encoding: 'utf-8' });
    return 0;
  }
}
