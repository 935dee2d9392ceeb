import type { Tool } from '@modelcontextprotocol/sdk/types.js';

const FILTER_DESCRIPTION =
  'Wire filter: a single-key object. AND/OR take an array of filters; IN maps fields to value lists; ' +
  'GT/GTE/LT/LTE map fields to bounds; CONTAINS maps fields to patterns; ' +
  'nested holds {path, AND|OR: [...]} for fields of a related entity.';

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: 'search_catalog',
    description:
      'Look a user term up in the field catalog with exact, partial and fuzzy matching. Returns candidate fields, best first.',
    inputSchema: {
      type: 'object',
      properties: {
        term: { type: 'string', description: 'Word or phrase to look up (e.g. "gender").' },
        maxCandidates: {
          type: 'number',
          description: 'Maximum candidates to return (default: CATALOG_MAX_CANDIDATES_PER_TERM).',
        },
      },
      required: ['term'],
    },
  },
  {
    name: 'resolve_terms',
    description:
      'Search every term and settle each on a single catalog field and value. Reports conflicts and unmatched terms.',
    inputSchema: {
      type: 'object',
      properties: {
        terms: {
          type: 'array',
          items: { type: 'string' },
          description: 'Terms to resolve (e.g. ["female", "kidney"]).',
        },
      },
      required: ['terms'],
    },
  },
  {
    name: 'build_query',
    description:
      'Turn a natural-language request or a list of terms into a GraphQL query with filter variables and a readable description.',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'Natural-language request (e.g. "girls with a kidney tumor").',
        },
        terms: {
          type: 'array',
          items: { type: 'string' },
          description: 'Already extracted terms; used when "query" is absent.',
        },
        logic: {
          type: 'string',
          enum: ['AND', 'OR'],
          description: 'How to combine terms given in "terms" (default AND).',
        },
        limit: { type: 'number', description: 'Page size of the query (default: QUERY_DEFAULT_LIMIT).' },
      },
    },
  },
  {
    name: 'encode_filter_state',
    description:
      'Encode a UI filter state as a wire filter. A standard state is {combineMode, values: {field: value}}; ' +
      'a composed state is {kind: "COMPOSED", combineMode, values: [state, ...]}.',
    inputSchema: {
      type: 'object',
      properties: {
        state: {
          type: 'object',
          description:
            'Filter state. Field values are {type: "OPTION", selectedValues: [...]} or {type: "RANGE", lowerBound, upperBound}; nested entity fields are keyed "entity.field".',
        },
      },
      required: ['state'],
    },
  },
  {
    name: 'decode_filter',
    description:
      'Decode a wire filter back into a UI filter state. Conditions the state cannot hold are reported as warnings.',
    inputSchema: {
      type: 'object',
      properties: {
        filter: { type: 'object', description: FILTER_DESCRIPTION },
      },
    },
  },
  {
    name: 'validate_filter',
    description: 'Check a wire filter against the catalog: unknown fields, invalid enum values, operators and bounds.',
    inputSchema: {
      type: 'object',
      properties: {
        filter: { type: 'object', description: FILTER_DESCRIPTION },
      },
      required: ['filter'],
    },
  },
  {
    name: 'suggest_values',
    description: 'Suggest valid values of an enum field, optionally matching a partial input.',
    inputSchema: {
      type: 'object',
      properties: {
        field: { type: 'string', description: 'Field path (e.g. "sex" or "tumor_assessments.tumor_site").' },
        partial: { type: 'string', description: 'Partial value typed so far.' },
        limit: { type: 'number', description: 'Maximum suggestions (default 5).' },
      },
      required: ['field'],
    },
  },
  {
    name: 'catalog_stats',
    description: 'Report catalog, index and search cache statistics.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'rebuild_index',
    description: 'Reload the catalog file and rebuild the search index.',
    inputSchema: {
      type: 'object',
      properties: {
        ifChanged: {
          type: 'boolean',
          description: 'Only rebuild when the catalog file changed since the last load.',
        },
      },
    },
  },
];
