import { existsSync } from 'fs';
import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { ResourceConflict } from '../errors.js';
import type { SandboxedFiles, Session, SideEffect } from '../interfaces/index.js';
import type { CoordinationHub } from '../services/coordination-hub.js';
import type { PermissionSandbox } from '../services/permission-sandbox.js';

/**
 * SandboxedFileAccess - File system access for one agent invocation
 *
 * Every call is checked by the Permission Sandbox against the invocation's
 * session before touching the disk. Writes also take the hub's per-file
 * write lock. Successful operations are recorded as side effects.
 */
export class SandboxedFileAccess implements SandboxedFiles {
  private effects: SideEffect[] = [];

  constructor(
    private sandbox: PermissionSandbox,
    private hub: CoordinationHub,
    private session: Session,
    private lockHolder: string
  ) {}

  async readFile(path: string): Promise<string> {
    const { path: projectPath } = this.sandbox.check(this.session, 'read', path);
    const content = await readFile(this.absolute(projectPath), 'utf-8');
    this.record({ operation: 'read', path: projectPath });
    return content;
  }

  async writeFile(path: string, content: string): Promise<void> {
    const { path: projectPath } = this.sandbox.check(this.session, 'write', path);

    if (!this.hub.acquireWriteLock(projectPath, this.lockHolder)) {
      throw new ResourceConflict(`'${projectPath}' is being written by ${this.hub.lockHolder(projectPath)}`, {
        details: { path: projectPath, agent: this.session.agentName }
      });
    }

    const fullPath = this.absolute(projectPath);
    const dir = dirname(fullPath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    await writeFile(fullPath, content, 'utf-8');
    this.record({ operation: 'write', path: projectPath });
  }

  async exists(path: string): Promise<boolean> {
    const { path: projectPath } = this.sandbox.check(this.session, 'read', path);
    return existsSync(this.absolute(projectPath));
  }

  /**
   * Entries of a directory, as project-relative paths
   */
  async list(dir: string): Promise<string[]> {
    const { path: projectPath } = this.sandbox.check(this.session, 'read', dir);
    const entries = await readdir(this.absolute(projectPath));
    return entries
      .sort()
      .map(name => (projectPath === '.' ? name : `${projectPath}/${name}`));
  }

  authorizeExecute(path: string): void {
    const { path: projectPath } = this.sandbox.check(this.session, 'execute', path);
    this.record({ operation: 'execute', path: projectPath });
  }

  record(effect: SideEffect): void {
    this.effects.push({ ...effect });
  }

  sideEffects(): SideEffect[] {
    return [...this.effects];
  }

  private absolute(projectPath: string): string {
    return join(this.sandbox.getProjectRoot(), projectPath);
  }
}
