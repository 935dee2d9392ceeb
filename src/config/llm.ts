export interface LlmConfig {
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  enableNormalization: boolean;
}

const boolFromEnv = (value: string | undefined, defaultValue: boolean) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

export function loadLlmConfig(): LlmConfig {
  const apiKey = process.env.OPENAI_API_KEY?.trim() || undefined;
  const model = process.env.CATALOG_LLM_MODEL?.trim() || 'gpt-4o-mini';

  const temperatureEnv = process.env.CATALOG_LLM_TEMPERATURE;
  const parsedTemperature = temperatureEnv ? Number(temperatureEnv) : 0;
  const temperature = Math.max(
    0,
    Math.min(2, Number.isFinite(parsedTemperature) ? parsedTemperature : 0)
  );

  const maxTokens = Math.max(1, Number(process.env.CATALOG_LLM_MAX_TOKENS ?? 1000) || 1000);

  // Normalization needs a key; without one the rule-based extractor is used
  const enableNormalization =
    boolFromEnv(process.env.CATALOG_ENABLE_LLM_NORMALIZATION, true) && apiKey !== undefined;

  return {
    apiKey,
    model,
    temperature,
    maxTokens,
    enableNormalization,
  };
}
