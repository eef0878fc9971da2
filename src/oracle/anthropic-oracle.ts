import Anthropic from '@anthropic-ai/sdk';
import type { OracleConfig } from '../types/index.js';
import { OracleError, errorMessage } from '../exception/errors.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { buildMutationPrompt, type MutationOracle } from './mutation-oracle.js';

/** The slice of the Anthropic client this oracle calls. */
export interface MessagesClient {
  messages: {
    create(body: Anthropic.Messages.MessageCreateParamsNonStreaming): PromiseLike<Anthropic.Messages.Message>;
  };
}

export class AnthropicMutationOracle implements MutationOracle {
  private client: MessagesClient;
  private logger: Logger;

  constructor(
    private config: OracleConfig,
    client?: MessagesClient,
    logger?: Logger,
  ) {
    this.client = client ?? new Anthropic();
    this.logger = logger ?? createLogger('Oracle');
  }

  async propose(text: string, contextLabel: string): Promise<string> {
    this.logger.info({ contentLength: text.length, context: contextLabel }, 'requesting content mutation');

    let response: Anthropic.Messages.Message;
    try {
      response = await this.client.messages.create({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        system: this.config.systemPrompt,
        messages: [{ role: 'user', content: buildMutationPrompt(text, contextLabel) }],
      });
    } catch (error) {
      throw new OracleError(`Mutation request failed: ${errorMessage(error)}`, { cause: error });
    }

    const block = response.content[0];
    const mutated = block && block.type === 'text' ? block.text.trim() : '';
    if (!mutated) {
      throw new OracleError('Invalid response from mutation model: no text content');
    }

    this.logger.info(
      { originalLength: text.length, modifiedLength: mutated.length },
      'content mutated',
    );
    return mutated;
  }
}
