import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { addLog } from '@insight/shared/logger';
import { AiSdkLlmClient, type LlmClient } from './llm.js';

type ChatModelFactory = ReturnType<typeof createOpenRouter>['chat'];

export type AiChatProvider = {
  chat: ChatModelFactory;
};

type CachedProvider = {
  provider: AiChatProvider;
  modelName: string;
};

let cachedProvider: CachedProvider | null = null;

export function ensureAiProvider(): CachedProvider {
  if (cachedProvider) {
    return cachedProvider;
  }

  const primaryKey =
    process.env.OPENROUTER_API_KEY ?? process.env.OPENAI_API_KEY;
  const baseURL =
    process.env.OPENROUTER_BASE_URL ??
    process.env.OPENAI_API_BASE_URL ??
    'https://openrouter.ai/api/v1';
  const modelName =
    process.env.OPENROUTER_MODEL_NAME ?? process.env.OPENAI_MODEL_NAME;

  if (!primaryKey) {
    throw new Error('Neither OPENROUTER_API_KEY nor OPENAI_API_KEY is set');
  }

  if (!modelName) {
    throw new Error(
      'OPENROUTER_MODEL_NAME or OPENAI_MODEL_NAME must be set',
    );
  }

  addLog(`Using OpenRouter provider with baseURL ${baseURL}, model ${modelName}`);
  const client = createOpenRouter({
    apiKey: primaryKey,
    baseURL,
  });

  cachedProvider = {
    provider: {
      chat: model => client.chat(model),
    },
    modelName,
  };

  return cachedProvider;
}

export function createLlmClient(): LlmClient {
  const { provider, modelName } = ensureAiProvider();
  const temperature = process.env.AI_TEMPERATURE ? Number(process.env.AI_TEMPERATURE) : undefined;
  return new AiSdkLlmClient(provider.chat(modelName), {
    temperature: Number.isFinite(temperature) ? temperature : undefined,
  });
}
