import { APIError, AzureOpenAI } from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { RenamerConfig } from '../config/env-config';
import { ModelRequestError, getErrorMessage } from '../errors';
import { NAMING_MAX_COMPLETION_TOKENS } from '../constants';

/**
 * The slice of the OpenAI SDK the client talks to. Tests pass a fake here.
 */
export interface ChatCompletionsEndpoint {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export type ChatCompletionOptions = {
  maxTokens?: number;
  temperature?: number;
};

/**
 * Anything that can turn a message list into the assistant's reply text.
 */
export interface ChatCompleter {
  chatCompletion(messages: ChatCompletionMessageParam[], options?: ChatCompletionOptions): Promise<string>;
}

/**
 * Build the Azure OpenAI SDK client from the process configuration.
 *
 * The SDK owns retries (exponential backoff on 408/409/429/5xx and connection
 * errors) and the per-request timeout.
 */
export function createAzureClient(config: RenamerConfig): AzureOpenAI {
  return new AzureOpenAI({
    apiKey: config.apiKey,
    endpoint: config.endpoint,
    deployment: config.deployment,
    apiVersion: config.apiVersion,
    maxRetries: config.maxRetries,
    timeout: config.timeoutMs,
  });
}

/**
 * LLM Client for the Azure OpenAI chat completions endpoint
 *
 * Every failure to get a usable answer (network, HTTP status, malformed body)
 * surfaces as ModelRequestError. An empty answer is returned as '' and left to
 * the caller to judge.
 */
export class LLMClient implements ChatCompleter {
  private readonly completions: ChatCompletionsEndpoint;
  private readonly model: string;
  private readonly deployment: string;

  constructor(config: RenamerConfig, completions?: ChatCompletionsEndpoint) {
    this.model = config.model;
    this.deployment = config.deployment;
    this.completions = completions ?? createAzureClient(config).chat.completions;
  }

  async chatCompletion(
    messages: ChatCompletionMessageParam[],
    options?: ChatCompletionOptions
  ): Promise<string> {
    console.log(
      `[LLMClient] Making API call - Deployment: ${this.deployment}, Model: ${this.model}, Messages: ${messages.length}`
    );

    let response: ChatCompletion;
    try {
      response = await this.completions.create({
        model: this.model,
        messages,
        max_completion_tokens: options?.maxTokens ?? NAMING_MAX_COMPLETION_TOKENS,
        temperature: options?.temperature,
      });
    } catch (error) {
      if (error instanceof APIError) {
        const status = typeof error.status === 'number' ? error.status : null;
        const prefix = status === null ? 'Request failed' : `HTTP ${status}`;
        throw new ModelRequestError(`${prefix}: ${error.message}`, status, { cause: error });
      }
      throw new ModelRequestError(`Request failed: ${getErrorMessage(error)}`, null, { cause: error });
    }

    if (!Array.isArray(response.choices) || response.choices.length === 0) {
      throw new ModelRequestError('API response has no choices');
    }

    const choice = response.choices[0];
    const content = choice.message?.content?.trim() ?? '';

    if (!content) {
      console.warn(
        `[LLMClient] Empty content in response. Finish reason: ${choice.finish_reason}, Model: ${this.model}`
      );
    }

    return content;
  }
}
