import OpenAI from 'openai';
import { PromptContext } from '../types';
import { withTimeout } from '../utils/retry';

export interface TextGeneratorOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  timeoutMs: number;
}

/**
 * Chat-completion backed post writer. Any failure (network, timeout, empty
 * answer) is thrown so the caller can fall back to templated text.
 */
export class TextGenerator {
  private readonly client: OpenAI;

  constructor(private readonly options: TextGeneratorOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL, // leave undefined for native OpenAI
    });
  }

  public async generateText(prompt: PromptContext): Promise<string> {
    const resp = await withTimeout(
      this.client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        max_tokens: prompt.maxTokens,
        temperature: prompt.temperature,
      }),
      this.options.timeoutMs,
      'Text generation',
    );
    const text = (resp.choices[0]?.message?.content ?? '').trim();
    if (!text) {
      throw new Error('Text generation returned an empty completion');
    }
    // Models sometimes wrap the whole post in quotes
    return text.replace(/^"([\s\S]*)"$/, '$1').trim();
  }
}
