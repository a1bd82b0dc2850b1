import OpenAI, { AzureOpenAI } from 'openai';
import type { ChatCompletionCreateParamsNonStreaming, ChatCompletionCreateParamsStreaming } from 'openai/resources/chat/completions';
import { DefaultAzureCredential, getBearerTokenProvider } from '@azure/identity';
import { config } from '../config/app.js';

const AZURE_SCOPE = 'https://cognitiveservices.azure.com/.default';

export interface ModelMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface JsonSchemaFormat {
  name: string;
  schema: Record<string, unknown>;
}

export interface CompletionRequest {
  model: string;
  messages: ModelMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Requests JSON output; the schema is only sent when MODEL_STRUCTURED_OUTPUT=json_schema. */
  jsonSchema?: JsonSchemaFormat;
  signal?: AbortSignal;
  user?: string;
}

let client: OpenAI | null = null;

function createClient(): OpenAI {
  if (config.MODEL_PROVIDER === 'azure') {
    if (!config.AZURE_OPENAI_ENDPOINT) {
      throw new Error('AZURE_OPENAI_ENDPOINT is required when MODEL_PROVIDER=azure.');
    }
    if (config.AZURE_OPENAI_API_KEY) {
      return new AzureOpenAI({
        endpoint: config.AZURE_OPENAI_ENDPOINT,
        apiKey: config.AZURE_OPENAI_API_KEY,
        apiVersion: config.AZURE_OPENAI_API_VERSION,
        maxRetries: 0
      });
    }
    return new AzureOpenAI({
      endpoint: config.AZURE_OPENAI_ENDPOINT,
      azureADTokenProvider: getBearerTokenProvider(new DefaultAzureCredential(), AZURE_SCOPE),
      apiVersion: config.AZURE_OPENAI_API_VERSION,
      maxRetries: 0
    });
  }

  if (!config.OPENAI_API_KEY) {
    throw new Error('OPENAI_API_KEY is required when MODEL_PROVIDER=openai.');
  }
  // Retries and timeouts are applied by utils/resilience at each call site.
  return new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    baseURL: config.OPENAI_BASE_URL,
    maxRetries: 0
  });
}

function getClient(): OpenAI {
  if (!client) {
    client = createClient();
  }
  return client;
}

function responseFormat(jsonSchema: JsonSchemaFormat | undefined): ChatCompletionCreateParamsNonStreaming['response_format'] {
  if (!jsonSchema) {
    return undefined;
  }
  if (config.MODEL_STRUCTURED_OUTPUT === 'json_schema') {
    return {
      type: 'json_schema',
      json_schema: { name: jsonSchema.name, schema: jsonSchema.schema, strict: true }
    };
  }
  return { type: 'json_object' };
}

export async function createCompletion(request: CompletionRequest): Promise<string> {
  const body: ChatCompletionCreateParamsNonStreaming = {
    model: request.model,
    messages: request.messages,
    temperature: request.temperature,
    max_tokens: request.maxTokens,
    response_format: responseFormat(request.jsonSchema),
    user: request.user
  };

  const completion = await getClient().chat.completions.create(body, { signal: request.signal });
  return completion.choices[0]?.message?.content ?? '';
}

/** Yields content deltas as the model produces them. */
export async function* streamCompletion(request: CompletionRequest): AsyncGenerator<string, void, undefined> {
  const body: ChatCompletionCreateParamsStreaming = {
    model: request.model,
    messages: request.messages,
    temperature: request.temperature,
    max_tokens: request.maxTokens,
    stream: true,
    user: request.user
  };

  const stream = await getClient().chat.completions.create(body, { signal: request.signal });
  for await (const chunk of stream) {
    const delta = chunk.choices[0]?.delta?.content;
    if (delta) {
      yield delta;
    }
  }
}

