import fs from 'fs-extra';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_USER_AGENTS_FILE = path.resolve(__dirname, '../../data/user-agents.json');

const UserAgentListSchema = z.array(z.string().min(1)).min(1);

/**
 * Source of client identity strings. Each call to `sample()` is independent;
 * there is no session affinity between requests.
 */
export interface IdentitySampler {
  sample(): string;
}

export class UserAgentPool implements IdentitySampler {
  private readonly agents: readonly string[];

  constructor(
    agents: readonly string[],
    private readonly random: () => number = Math.random
  ) {
    if (agents.length === 0) {
      throw new Error('UserAgentPool requires at least one user agent');
    }
    this.agents = [...agents];
  }

  static fromFile(filePath: string = DEFAULT_USER_AGENTS_FILE): UserAgentPool {
    const parsed = UserAgentListSchema.safeParse(fs.readJsonSync(filePath));
    if (!parsed.success) {
      throw new Error(`User agent list at ${filePath} must be a non-empty array of strings`);
    }
    return new UserAgentPool(parsed.data);
  }

  get size(): number {
    return this.agents.length;
  }

  sample(): string {
    const index = Math.min(Math.floor(this.random() * this.agents.length), this.agents.length - 1);
    return this.agents[index];
  }
}

/** Always answers with the same identity. */
export class FixedIdentity implements IdentitySampler {
  constructor(private readonly userAgent: string) {}

  sample(): string {
    return this.userAgent;
  }
}
