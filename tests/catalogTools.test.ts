import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { join } from 'path';
import { CatalogController, McpContent } from '../src/server/CatalogController.js';
import { createCatalogController, handleToolCall } from '../src/server/CatalogServer.js';
import { TOOL_DEFINITIONS } from '../src/server/toolDefinitions.js';
import { ScriptedChatClient } from './helpers/ScriptedChatClient.js';
import {
  SAMPLE_CATALOG,
  createTempDir,
  removeTempDir,
  writeCatalogFile,
} from './helpers/catalogFixture.js';

const PROJECT_ROOT = join(__dirname, '..');

function textOf(result: McpContent): string {
  return result.content[0].text;
}

function payloadOf(result: McpContent): unknown {
  const text = textOf(result);
  return JSON.parse(text.slice(text.indexOf('\n\n{') + 2));
}

describe('Catalog MCP tools', () => {
  let dir: string;
  let chat: ScriptedChatClient;
  let controller: CatalogController;

  const call = (name: string, args: Record<string, unknown> = {}) =>
    handleToolCall(controller, name, args);

  beforeAll(() => {
    dir = createTempDir('catalog-tools');
    chat = new ScriptedChatClient();
    controller = createCatalogController({
      catalogPath: writeCatalogFile(dir, SAMPLE_CATALOG),
      projectRoot: PROJECT_ROOT,
      chatClient: chat,
    });
  });

  afterAll(() => {
    removeTempDir(dir);
  });

  it('should declare a definition for every routed tool', () => {
    expect(TOOL_DEFINITIONS.map((tool) => tool.name)).toEqual([
      'search_catalog',
      'resolve_terms',
      'build_query',
      'encode_filter_state',
      'decode_filter',
      'validate_filter',
      'suggest_values',
      'catalog_stats',
      'rebuild_index',
    ]);
  });

  describe('search_catalog', () => {
    it('should list candidate fields for a term', async () => {
      const result = await call('search_catalog', { term: 'gender' });

      expect(result.isError).toBe(false);
      expect(textOf(result).split('\n')[0]).toBe('Found 1 candidate field(s) for "gender".');
      expect(payloadOf(result)).toEqual({
        term: 'gender',
        candidates: [
          {
            path: 'sex',
            type: 'enum',
            score: 1,
            strategy: 'exact',
            reason: 'Exact match on "gender"',
          },
        ],
      });
    });

    it('should report a missing term as an error result', async () => {
      const result = await call('search_catalog', {});

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe('Error: "term" must be a non-empty string');
    });
  });

  describe('resolve_terms', () => {
    it('should settle each term on one field', async () => {
      const result = await call('resolve_terms', { terms: ['female', ' kidney '] });

      expect(textOf(result).split('\n')[0]).toBe('Resolved 2 of 2 term(s).');
      expect(payloadOf(result)).toEqual({
        resolvedFields: [
          {
            term: 'female',
            fieldPath: 'sex',
            fieldType: 'enum',
            value: 'Female',
            operator: 'eq',
            confidence: 1,
          },
          {
            term: 'kidney',
            fieldPath: 'tumor_assessments.tumor_site',
            fieldType: 'enum',
            value: 'Kidney',
            operator: 'eq',
            confidence: 1,
          },
        ],
        conflicts: [],
        warnings: [],
      });
    });
  });

  describe('build_query', () => {
    const expectedVariables = {
      filter: { AND: [{ IN: { race: ['Asian'] } }, { IN: { sex: ['Female'] } }] },
    };

    it('should build a query from model-extracted terms', async () => {
      chat.queueJson({
        terms: [
          { original: 'Asian', normalized: 'asian', position: 0, confidence: 0.9 },
          { original: 'girls', normalized: 'female', position: 1, confidence: 0.9 },
        ],
        logic: 'AND',
        confidence: 0.9,
      });

      const result = await call('build_query', { query: 'Asian girls', limit: 10 });
      const payload = payloadOf(result);

      expect(textOf(result).split('\n')[0]).toBe(
        "Cases where Race equals 'Asian' and Sex equals 'Female'"
      );
      expect(payload).toMatchObject({
        variables: expectedVariables,
        terms: ['asian', 'female'],
        logic: 'AND',
        warnings: [],
      });
      expect(chat.requests[chat.requests.length - 1].userContent).toContain('Query: "Asian girls"');
    });

    it('should fall back to rule-based extraction when the model fails', async () => {
      chat.queueError(new Error('invalid request'));

      const result = await call('build_query', { query: 'Asian girls' });

      expect(payloadOf(result)).toMatchObject({
        variables: expectedVariables,
        terms: ['asian', 'female'],
      });
    });

    it('should accept terms with OR logic', async () => {
      const result = await call('build_query', { terms: ['asian', 'white'], logic: 'or' });

      expect(payloadOf(result)).toMatchObject({
        variables: { filter: { OR: [{ IN: { race: ['Asian'] } }, { IN: { race: ['White'] } }] } },
        warnings: ["Multiple filters on field 'race' - may be conflicting"],
      });
    });

    it('should require a query or terms', async () => {
      const result = await call('build_query', {});

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe('Error: Provide either "query" or "terms"');
    });

    it('should reject an invalid limit', async () => {
      const result = await call('build_query', { terms: ['asian'], limit: 0 });

      expect(textOf(result)).toBe('Error: "limit" must be a positive integer');
    });
  });

  describe('filter state tools', () => {
    it('should encode a filter state', async () => {
      const result = await call('encode_filter_state', {
        state: {
          combineMode: 'AND',
          values: { sex: { type: 'OPTION', selectedValues: ['Male'] } },
        },
      });

      expect(payloadOf(result)).toEqual({ filter: { IN: { sex: ['Male'] } } });
    });

    it('should report a malformed state with its path', async () => {
      const result = await call('encode_filter_state', {
        state: { combineMode: 'XOR', values: {} },
      });

      expect(textOf(result)).toBe('Error: combineMode must be AND or OR (at $.state.combineMode)');
    });

    it('should decode a wire filter', async () => {
      const result = await call('decode_filter', { filter: { IN: { sex: ['Male'] } } });

      expect(payloadOf(result)).toEqual({
        state: {
          kind: 'STANDARD',
          combineMode: 'AND',
          values: { sex: { type: 'OPTION', selectedValues: ['Male'], isExclusion: false } },
        },
        warnings: [],
      });
    });
  });

  describe('validate_filter', () => {
    it('should accept a valid filter', async () => {
      const result = await call('validate_filter', { filter: { IN: { sex: ['Male'] } } });

      expect(result.isError).toBe(false);
      expect(payloadOf(result)).toEqual({ valid: true, violations: [] });
    });

    it('should list violations and flag the result', async () => {
      const result = await call('validate_filter', { filter: { IN: { sex: ['Robot'] } } });

      expect(result.isError).toBe(true);
      expect(payloadOf(result)).toEqual({
        valid: false,
        violations: ["Invalid value for enum field 'sex': \"Robot\""],
      });
    });
  });

  describe('suggest_values', () => {
    it('should suggest enum values matching a prefix', async () => {
      const result = await call('suggest_values', { field: 'sex', partial: 'fe' });

      expect(payloadOf(result)).toEqual({ field: 'sex', partial: 'fe', suggestions: ['Female'] });
    });

    it('should list values when nothing is typed', async () => {
      const result = await call('suggest_values', { field: 'race', limit: 2 });

      expect(payloadOf(result)).toEqual({ field: 'race', partial: '', suggestions: ['Asian', 'White'] });
    });

    it('should reject unknown and non-enum fields', async () => {
      expect(textOf(await call('suggest_values', { field: 'weight' }))).toBe(
        "Error: Unknown field path: 'weight'"
      );
      expect(textOf(await call('suggest_values', { field: 'age_at_censor_status' }))).toBe(
        "Error: Field 'age_at_censor_status' is not an enum field"
      );
    });
  });

  describe('index maintenance', () => {
    it('should report catalog and index statistics', async () => {
      const payload = payloadOf(await call('catalog_stats'));

      expect(payload).toMatchObject({
        catalog: { totalEntries: 9, validFields: 9 },
        index: { totalFields: 9, pathsIndexed: 9 },
        cache: null,
      });
    });

    it('should keep the index when the catalog is unchanged', async () => {
      const result = await call('rebuild_index', { ifChanged: true });

      expect(textOf(result).split('\n')[0]).toBe('Catalog file unchanged; index kept.');
      expect(payloadOf(result)).toMatchObject({ rebuilt: false });
    });

    it('should rebuild on request', async () => {
      const result = await call('rebuild_index');

      expect(textOf(result).split('\n')[0]).toBe('Index rebuilt with 9 field(s).');
    });
  });

  it('should answer an unknown tool with an error result', async () => {
    const result = await call('drop_tables');

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error: Unknown tool: drop_tables' }],
      isError: true,
    });
  });
});
