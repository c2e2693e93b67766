import fs from 'fs';
import os from 'os';
import path from 'path';

/**
 * A temporary directory owned by a single run. The directory is removed on
 * `dispose()`, or when the Node process exits if the run never got there.
 */
export class Workspace {
  readonly root: string;
  private disposed = false;
  private readonly exitHook: () => void;

  private constructor(root: string) {
    this.root = root;
    this.exitHook = () => {
      fs.rmSync(this.root, { recursive: true, force: true });
    };
    process.once('exit', this.exitHook);
  }

  static async create(prefix: string, parent: string = os.tmpdir()): Promise<Workspace> {
    const root = await fs.promises.mkdtemp(path.join(parent, prefix));
    return new Workspace(root);
  }

  resolve(...parts: string[]): string {
    return path.join(this.root, ...parts);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Remove the directory now; safe to call more than once. */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    process.removeListener('exit', this.exitHook);
    await fs.promises.rm(this.root, { recursive: true, force: true });
  }

  /** Leave the directory on disk, also after the process exits. */
  keep(): void {
    if (this.disposed) return;
    this.disposed = true;
    process.removeListener('exit', this.exitHook);
  }
}
