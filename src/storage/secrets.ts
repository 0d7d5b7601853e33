// Credential store
// Per-domain Jira credentials, kept in an owner-only secrets.json

import { z } from 'zod';
import type { Credential } from '../types.js';
import { StoreError } from '../errors.js';
import { RecordStore } from './records.js';

export const SECRETS_FILE = 'secrets.json';

const credentialSchema = z.object({
  domain: z.string(),
  email: z.string(),
  apiKey: z.string(),
  cloudId: z.string().optional(),
});

export class CredentialStore {
  private readonly store: RecordStore<Credential>;

  constructor(dir: string) {
    this.store = new RecordStore({ dir, fileName: SECRETS_FILE, schema: credentialSchema, mode: 0o600 });
  }

  get filePath(): string {
    return this.store.filePath;
  }

  /**
   * Save credentials for a domain, replacing any existing entry
   */
  async register(domain: string, email: string, apiKey: string, cloudId?: string): Promise<void> {
    const credential: Credential = { domain, email, apiKey };
    if (cloudId) {
      credential.cloudId = cloudId;
    }
    await this.store.put(domain, credential);
  }

  async lookup(domain: string): Promise<Credential> {
    const credential = await this.store.get(domain);
    if (!credential) {
      throw new StoreError('NotFound', `No API key found for domain ${domain}. Register it with --register-secrets first.`);
    }
    return credential;
  }

  async has(domain: string): Promise<boolean> {
    return (await this.store.get(domain)) !== undefined;
  }

  async remove(domain: string): Promise<boolean> {
    return this.store.delete(domain);
  }

  /**
   * Registered domains with their emails. API keys are never listed.
   */
  async list(): Promise<Array<{ domain: string; email: string }>> {
    const entries = await this.store.entries();
    return entries
      .map(([domain, credential]) => ({ domain, email: credential.email }))
      .sort((a, b) => a.domain.localeCompare(b.domain));
  }
}
