import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { PromptManager } from '../PromptManager.js';
import { createTempDir, removeTempDir } from '../../../tests/helpers/catalogFixture.js';

describe('PromptManager', () => {
  let dir: string;
  let prompts: PromptManager;

  beforeEach(() => {
    dir = createTempDir('prompts');
    writeFileSync(join(dir, 'greet.txt'), 'Hello {{ name }}, query: {{query}}\n');
    writeFileSync(join(dir, 'plain.txt'), 'No placeholders.');
    prompts = new PromptManager(dir);
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('should load and trim a prompt', () => {
    expect(prompts.getPrompt('plain')).toBe('No placeholders.');
  });

  it('should fill placeholders', () => {
    expect(prompts.render('greet', { name: 'Ada', query: 'age', unused: 'x' })).toBe(
      'Hello Ada, query: age'
    );
  });

  it('should reject a missing placeholder value', () => {
    expect(() => prompts.render('greet', { name: 'Ada' })).toThrow(
      'Prompt "greet" needs a value for {{query}}'
    );
  });

  it('should report a missing file', () => {
    expect(() => prompts.getPrompt('absent')).toThrow('Prompt file not found: absent.txt');
  });

  it('should serve cached content until the cache is cleared', () => {
    expect(prompts.getPrompt('plain')).toBe('No placeholders.');
    writeFileSync(join(dir, 'plain.txt'), 'Changed.');

    expect(prompts.getPrompt('plain')).toBe('No placeholders.');
    prompts.clearCache();
    expect(prompts.getPrompt('plain')).toBe('Changed.');
  });

  it('should compose prompts in order', () => {
    expect(prompts.composePrompt(['plain', 'greet'], { name: 'Bo', query: 'sex' })).toBe(
      'No placeholders.\n\nHello Bo, query: sex'
    );
  });
});
