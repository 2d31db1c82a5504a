import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { config } from '../config/app.js';
import { PromptUnavailableError } from '../utils/errors.js';

export const PROMPT_NAMES = [
  'input-validation-system',
  'understanding-system',
  'planning-system',
  'react-reasoning-system',
  'synthesis-direct-system',
  'synthesis-data-system',
  'memory-summary-system'
] as const;

export type PromptName = (typeof PROMPT_NAMES)[number];

export interface PromptProvider {
  /** Throws `PromptUnavailableError` when the prompt does not exist. */
  get(name: PromptName): string;
}

export function assertAvailable(provider: PromptProvider, names: readonly PromptName[] = PROMPT_NAMES): void {
  for (const name of names) {
    provider.get(name);
  }
}

/**
 * Reads `<dir>/<name>.md`, trimmed, and caches it for the life of the
 * provider.
 */
export class FilePromptProvider implements PromptProvider {
  private readonly cache = new Map<PromptName, string>();
  private readonly dir: string;

  constructor(dir: string = config.PROMPTS_DIR) {
    this.dir = resolve(dir);
  }

  get(name: PromptName): string {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const path = join(this.dir, `${name}.md`);
    if (!existsSync(path)) {
      throw new PromptUnavailableError(name);
    }

    const content = readFileSync(path, 'utf8').trim();
    if (!content) {
      throw new PromptUnavailableError(name);
    }

    this.cache.set(name, content);
    return content;
  }
}

export class StaticPromptProvider implements PromptProvider {
  constructor(private readonly prompts: Partial<Record<PromptName, string>>) {}

  get(name: PromptName): string {
    const prompt = this.prompts[name];
    if (!prompt) {
      throw new PromptUnavailableError(name);
    }
    return prompt;
  }
}
