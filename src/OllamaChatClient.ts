import { type GenerateRequest, type GenerateResponse, Ollama } from 'ollama';
import type { ConfigManager } from './ConfigManager';
import { LlmError, errorMessage } from './errors';
import { WithLogging } from './WithLogging';

/**
 * Text generation backend used by the support agent
 */
export interface LlmClient {
  generate(prompt: string): Promise<string>;
}

export interface OllamaGenerateClient {
  generate(
    request: GenerateRequest & { stream: false }
  ): Promise<Pick<GenerateResponse, 'response'>>;
}

/**
 * Non-streaming completion through a local Ollama server
 */
export class OllamaChatClient extends WithLogging implements LlmClient {
  protected readonly componentName = 'OllamaChatClient';
  private readonly client: OllamaGenerateClient;

  constructor(
    protected readonly configManager: ConfigManager,
    client?: OllamaGenerateClient
  ) {
    super();
    this.client =
      client ?? new Ollama({ host: this.configManager.get('ollamaUrl') });
  }

  async generate(prompt: string): Promise<string> {
    const model = this.configManager.get('llmModel');
    this.verbose(`Generating with ${model} (${prompt.length} prompt chars)`);

    try {
      const response = await this.client.generate({
        model,
        prompt,
        stream: false,
        options: {
          temperature: this.configManager.get('llmTemperature'),
          num_predict: this.configManager.get('llmMaxTokens'),
        },
      });
      return response.response;
    } catch (error) {
      const message = errorMessage(error);
      this.error(`Failed to generate response: ${message}`);
      if (message.includes('not found')) {
        throw new LlmError(
          `Model ${model} not found. Run: ollama pull ${model}`,
          { cause: error }
        );
      }
      throw new LlmError(
        `Cannot generate with Ollama at ${this.configManager.get('ollamaUrl')}: ${message}`,
        { cause: error }
      );
    }
  }
}
