import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { resolve } from 'path';

import { CatalogIndex } from '../catalog/CatalogIndex.js';
import { CatalogLoader } from '../catalog/CatalogLoader.js';
import { SearchCache } from '../catalog/SearchCache.js';
import { loadCatalogConfig } from '../config/catalog.js';
import { loadLlmConfig } from '../config/llm.js';
import { loadQueryConfig } from '../config/query.js';
import { FilterCodec } from '../filters/FilterCodec.js';
import { FilterComposer } from '../filters/FilterComposer.js';
import { ChatClient, LLMClient } from '../llm/LLMClient.js';
import { LlmTermExtractor } from '../llm/LlmTermExtractor.js';
import { PromptManager } from '../llm/PromptManager.js';
import { RuleBasedTermExtractor } from '../llm/RuleBasedTermExtractor.js';
import { TermExtractor } from '../llm/TermExtractor.js';
import { QueryPipeline } from '../pipeline/QueryPipeline.js';
import { QueryBuilder } from '../query/QueryBuilder.js';
import { ConflictResolver } from '../resolver/ConflictResolver.js';
import { errorMessage, logger } from '../utils/logger.js';
import { FieldValidator } from '../validators/FieldValidator.js';
import { CatalogController, McpContent } from './CatalogController.js';
import { TOOL_DEFINITIONS } from './toolDefinitions.js';
import { ToolArgs } from './toolArgs.js';

export interface CatalogServerConfig {
  catalogPath?: string;
  openaiApiKey?: string;
  projectRoot?: string;
  /** Replaces the OpenAI client, e.g. with a scripted one in tests */
  chatClient?: ChatClient;
}

/**
 * Wire the catalog services from environment configuration.
 */
export function createCatalogController(config: CatalogServerConfig = {}): CatalogController {
  const catalogConfig = loadCatalogConfig();
  const queryConfig = loadQueryConfig();
  const llmConfig = loadLlmConfig();

  const projectRoot = config.projectRoot || process.cwd();
  const catalogPath = config.catalogPath
    ? resolve(projectRoot, config.catalogPath)
    : catalogConfig.catalogPath;

  const index = new CatalogIndex(new CatalogLoader(catalogPath), {
    keywordMatchThreshold: catalogConfig.keywordMatchThreshold,
    maxCandidatesPerTerm: catalogConfig.maxCandidatesPerTerm,
    minTermLength: catalogConfig.minTermLength,
  });
  const cache =
    catalogConfig.searchCacheSize > 0
      ? new SearchCache(index, {
          maxSize: catalogConfig.searchCacheSize,
          ttlMs: catalogConfig.searchCacheTtlMs,
        })
      : undefined;

  const ruleBased = new RuleBasedTermExtractor({ minTermLength: catalogConfig.minTermLength });
  const apiKey = config.openaiApiKey || llmConfig.apiKey;
  let chatClient = config.chatClient;
  if (!chatClient && llmConfig.enableNormalization && apiKey) {
    chatClient = new LLMClient(apiKey, llmConfig.model);
  }

  let extractor: TermExtractor = ruleBased;
  if (chatClient) {
    extractor = new LlmTermExtractor(
      chatClient,
      new PromptManager(resolve(projectRoot, 'prompts')),
      ruleBased,
      {
        model: llmConfig.model,
        temperature: llmConfig.temperature,
        maxTokens: llmConfig.maxTokens,
      }
    );
  }

  const search = cache ?? index;
  const resolver = new ConflictResolver();
  const pipeline = new QueryPipeline({
    extractor,
    search,
    resolver,
    composer: new FilterComposer(),
    builder: new QueryBuilder(queryConfig),
  });

  logger.info('Catalog services configured', {
    catalogPath,
    extractor: extractor.name,
    searchCacheSize: catalogConfig.searchCacheSize,
    rootEntity: queryConfig.rootEntity,
  });

  return new CatalogController({
    index,
    search,
    cache,
    validator: new FieldValidator(index),
    resolver,
    codec: new FilterCodec(),
    pipeline,
  });
}

function dispatch(controller: CatalogController, name: string, args: ToolArgs): Promise<McpContent> {
  switch (name) {
    case 'search_catalog':
      return controller.handleSearchCatalogTool(args);
    case 'resolve_terms':
      return controller.handleResolveTermsTool(args);
    case 'build_query':
      return controller.handleBuildQueryTool(args);
    case 'encode_filter_state':
      return controller.handleEncodeFilterStateTool(args);
    case 'decode_filter':
      return controller.handleDecodeFilterTool(args);
    case 'validate_filter':
      return controller.handleValidateFilterTool(args);
    case 'suggest_values':
      return controller.handleSuggestValuesTool(args);
    case 'catalog_stats':
      return controller.handleCatalogStatsTool();
    case 'rebuild_index':
      return controller.handleRebuildIndexTool(args);
    default:
      throw new Error(`Unknown tool: ${name}`);
  }
}

/**
 * Route one tool call to its handler. Failures come back as an `Error: ...`
 * result instead of propagating to the transport; the timer logs them.
 */
export async function handleToolCall(
  controller: CatalogController,
  name: string,
  args: ToolArgs = {}
): Promise<McpContent> {
  try {
    return await logger.withTimer(`tool:${name}`, { tool: name }, () =>
      dispatch(controller, name, args)
    );
  } catch (error) {
    return {
      content: [
        {
          type: 'text',
          text: `Error: ${errorMessage(error)}`,
        },
      ],
      isError: true,
    };
  }
}

export function createCatalogServer(config?: CatalogServerConfig): Server {
  const controller = createCatalogController(config);

  const server = new Server(
    {
      name: 'catalog-filter-server',
      version: '1.0.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.info('Tool request', {
      tool: name,
      argumentsSize: args ? JSON.stringify(args).length : 0,
    });
    return handleToolCall(controller, name, args ?? {});
  });

  return server;
}
