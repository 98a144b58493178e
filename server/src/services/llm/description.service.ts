/**
 * Description Service
 * Generates a short story about a place, trying each configured model in order.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import type { LLMProvider, Message } from '../../llm/types.js';
import { DESCRIPTION_MAX_TOKENS, DESCRIPTION_TEMPERATURE } from '../../config/index.js';
import {
  isErrorText,
  toErrorText,
  type DescriptionProvider,
  type DescriptionRequest,
} from '../places/types.js';

export function buildDescriptionMessages(request: DescriptionRequest): Message[] {
  const { city, street, placeName, placeAddress, originalName } = request;
  const context = originalName && originalName !== placeName
    ? `Original name: ${originalName}\n`
    : '';

  return [
    {
      role: 'system',
      content:
        `You are a time traveller that has seen the past and knows everything about the ${city}. ` +
        `Provide a concise historical overview of ${placeName}, located at ${placeAddress}. ${context}` +
        'Structure your response as follows: First make a short yet catchy explanation of the place, that teases what you will talk about later. ' +
        'Then describe its appearance and key features; then tell proven historical facts about the place (if they exist). ' +
        'Keep the response under 150 words, engaging, and informative. ' +
        'Use only English language throughout the entire response.',
    },
    {
      role: 'user',
      content: `Street: ${street}, City: ${city}, POI: ${placeName}, Address: ${placeAddress}`,
    },
  ];
}

export class DescriptionService implements DescriptionProvider {
  constructor(
    private readonly llm: LLMProvider | null,
    private readonly models: readonly string[]
  ) {}

  async describe(request: DescriptionRequest): Promise<string> {
    if (!this.llm) {
      return toErrorText('Story provider is not configured');
    }

    if (!request.city || !request.placeName) {
      return toErrorText('Insufficient information to generate a story');
    }

    const messages = buildDescriptionMessages(request);
    let lastError = toErrorText('No models configured');

    for (const model of this.models) {
      try {
        const story = (await this.llm.complete(messages, {
          model,
          temperature: DESCRIPTION_TEMPERATURE,
          maxTokens: DESCRIPTION_MAX_TOKENS,
        })).trim();

        if (story && !isErrorText(story)) {
          return story;
        }
        lastError = toErrorText(`Empty response from ${model}`);
      } catch (error) {
        lastError = toErrorText(error instanceof Error ? error.message : String(error));
      }

      logger.warn({ event: 'description_model_failed', model, error: lastError }, '[Description] Model failed, trying next');
    }

    return lastError;
  }
}
