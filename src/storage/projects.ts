// Project registry
// Binds a git working tree (its top-level path) to a Jira domain

import { z } from 'zod';
import type { ProjectBinding } from '../types.js';
import { StoreError } from '../errors.js';
import { RecordStore } from './records.js';

export const PROJECTS_FILE = 'projects.json';

const bindingSchema = z.object({
  projectId: z.string(),
  domain: z.string(),
  registeredAt: z.string(),
});

export class ProjectRegistry {
  private readonly store: RecordStore<ProjectBinding>;

  constructor(dir: string, private readonly now: () => Date = () => new Date()) {
    this.store = new RecordStore({ dir, fileName: PROJECTS_FILE, schema: bindingSchema });
  }

  /**
   * Bind a project to a domain. Last write wins.
   *
   * @returns The domain previously bound to the project, if any
   */
  async register(projectId: string, domain: string): Promise<string | undefined> {
    const previous = await this.store.put(projectId, {
      projectId,
      domain,
      registeredAt: this.now().toISOString(),
    });
    return previous?.domain;
  }

  async lookup(projectId: string): Promise<string> {
    const binding = await this.store.get(projectId);
    if (!binding) {
      throw new StoreError('NotFound', `No Jira domain registered for ${projectId}. Run --register-project <domain> first.`);
    }
    return binding.domain;
  }

  async remove(projectId: string): Promise<boolean> {
    return this.store.delete(projectId);
  }
}
