import { NotFoundError } from '../types/index.js';
import { readFileSafe, writeFileAtomic } from '../utils/index.js';
import { logger } from '../utils/logger.js';
import { GuardrailService, assertAllowed } from './GuardrailService.js';

/**
 * File access under the workspace root. Every path is checked by the
 * guardrails before it is touched.
 */
export class WorkspaceService {
  constructor(private guardrails: GuardrailService) {}

  async readInput(relativePath: string): Promise<string> {
    assertAllowed(this.guardrails.checkPath(relativePath, 'workspace'), `Read of ${relativePath}`);
    const content = await readFileSafe(this.guardrails.resolvePath(relativePath, 'workspace'));
    if (content === null) {
      throw new NotFoundError('Workspace file', relativePath);
    }
    return content;
  }

  /**
   * Write generated output and return the absolute path written.
   */
  async write(relativePath: string, content: string): Promise<string> {
    assertAllowed(this.guardrails.checkPath(relativePath, 'workspace'), `Write to ${relativePath}`);
    const absolute = this.guardrails.resolvePath(relativePath, 'workspace');
    await writeFileAtomic(absolute, content);
    logger.debug(`Wrote ${content.length} characters to ${relativePath}`, { path: absolute });
    return absolute;
  }
}
