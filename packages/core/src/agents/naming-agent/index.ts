/**
 * NamingAgent - asks the model for a descriptive file name
 *
 * One chat completion per file. The reply is parsed into a RenameSuggestion;
 * a reply that yields no usable name is a ModelParseError.
 */
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { ChatCompleter } from '../llm-client';
import type { Excerpt } from '../../extractors/types';
import type { NameSuggester, RenameSuggestion } from './types';
import { parseNamingResponse } from './parsers';
import { buildNamingSystemPrompt, buildNamingUserPrompt } from '../prompts/naming-agent-prompt';
import { ModelParseError } from '../../errors';
import { NAMING_MAX_COMPLETION_TOKENS, NAMING_TEMPERATURE } from '../../constants';

export type NamingAgentOptions = {
  /** Ask for a YYYY-MM-DD_ prefix (default true) */
  datePrefix?: boolean;
};

export class NamingAgent implements NameSuggester {
  private readonly systemPrompt: string;

  constructor(
    private readonly llmClient: ChatCompleter,
    options: NamingAgentOptions = {}
  ) {
    this.systemPrompt = buildNamingSystemPrompt({ datePrefix: options.datePrefix ?? true });
  }

  buildMessages(excerpt: Excerpt): ChatCompletionMessageParam[] {
    return [
      { role: 'system', content: this.systemPrompt },
      { role: 'user', content: buildNamingUserPrompt(excerpt) },
    ];
  }

  async suggestName(excerpt: Excerpt): Promise<RenameSuggestion> {
    const response = await this.llmClient.chatCompletion(this.buildMessages(excerpt), {
      maxTokens: NAMING_MAX_COMPLETION_TOKENS,
      temperature: NAMING_TEMPERATURE,
    });

    const suggestion = parseNamingResponse(response);
    if (!suggestion.valid) {
      const preview = response.length > 200 ? `${response.slice(0, 200)}...` : response;
      throw new ModelParseError(
        response.trim() ? `No usable file name in model response: "${preview}"` : 'Model returned an empty response',
        response
      );
    }

    console.log(`[NamingAgent] Suggested "${suggestion.baseName}"`);
    return suggestion;
  }
}

export type { NameSuggester, RenameSuggestion } from './types';
export { parseNamingResponse, extractCandidateName, resolveDatePlaceholder, formatDate } from './parsers';
