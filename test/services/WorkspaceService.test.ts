import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, mkdirSync, writeFileSync } from 'fs';
import path from 'path';
import { GuardrailService } from '../../src/services/GuardrailService.js';
import { WorkspaceService } from '../../src/services/WorkspaceService.js';
import { NotFoundError, SecurityViolationError } from '../../src/types/index.js';
import { TestDirs, createTestDirs, removeDir } from '../fixtures/index.js';

describe('WorkspaceService', () => {
  let dirs: TestDirs;
  let workspace: WorkspaceService;

  beforeEach(() => {
    dirs = createTestDirs();
    workspace = new WorkspaceService(
      new GuardrailService({
        workspaceRoot: dirs.workspaceRoot,
        agentRoot: dirs.agentRoot,
        maxPayloadBytes: 1000,
        maxOutputBytes: 1000,
        allowedExtensions: ['.py', '.md'],
        allowedCommands: [],
      })
    );
  });

  afterEach(() => {
    removeDir(dirs.root);
  });

  it('writes output under the workspace root', async () => {
    const written = await workspace.write('tests/test_add.py', 'assert True\n');

    expect(written).toBe(path.join(dirs.workspaceRoot, 'tests/test_add.py'));
    expect(readFileSync(written, 'utf8')).toBe('assert True\n');
  });

  it('reads an input file', async () => {
    mkdirSync(path.join(dirs.workspaceRoot, 'src'));
    writeFileSync(path.join(dirs.workspaceRoot, 'src/add.py'), 'def add(a, b): return a + b\n');

    expect(await workspace.readInput('src/add.py')).toBe('def add(a, b): return a + b\n');
  });

  it('reports a missing input file', async () => {
    await expect(workspace.readInput('src/missing.py')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('refuses paths that leave the workspace', async () => {
    await expect(workspace.write('../agent/notes.md', 'x')).rejects.toThrow(
      'Write to ../agent/notes.md blocked by path-containment: ' +
        'Path "../agent/notes.md" contains a parent-directory segment (workspace scope)'
    );
    expect(existsSync(path.join(dirs.agentRoot, 'notes.md'))).toBe(false);
  });

  it('refuses disallowed extensions and sensitive locations', async () => {
    await expect(workspace.write('run.sh', 'x')).rejects.toBeInstanceOf(SecurityViolationError);
    await expect(workspace.readInput('.git/config.md')).rejects.toThrow('is inside .git/');
  });
});
