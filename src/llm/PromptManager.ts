import { readFileSync } from 'fs';
import { join } from 'path';

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

/**
 * PromptManager
 * Loads and caches prompt templates from the prompts directory and fills
 * their `{{name}}` placeholders.
 */
export class PromptManager {
  private promptsDir: string;
  private cache: Map<string, string>;

  constructor(promptsDir: string) {
    this.promptsDir = promptsDir;
    this.cache = new Map();
  }

  /**
   * Load a prompt file by name
   * @param name Prompt file name (without .txt extension)
   */
  getPrompt(name: string): string {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const filePath = join(this.promptsDir, `${name}.txt`);
    try {
      const content = readFileSync(filePath, 'utf-8').trim();
      this.cache.set(name, content);
      return content;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new Error(`Prompt file not found: ${name}.txt`, { cause: error });
      }
      throw new Error(
        `Failed to load prompt "${name}": ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Fill a template. Every placeholder must have a value; unused values are ignored.
   */
  render(name: string, variables: Record<string, string> = {}): string {
    return this.getPrompt(name).replace(PLACEHOLDER, (_match, key: string) => {
      const value = variables[key];
      if (value === undefined) {
        throw new Error(`Prompt "${name}" needs a value for {{${key}}}`);
      }
      return value;
    });
  }

  /**
   * Join several rendered prompts, in order, separated by a blank line.
   */
  composePrompt(promptNames: string[], variables: Record<string, string> = {}): string {
    return promptNames.map((name) => this.render(name, variables)).join('\n\n');
  }

  clearCache(): void {
    this.cache.clear();
  }
}
