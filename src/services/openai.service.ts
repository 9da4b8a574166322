import OpenAI from 'openai';
import { getOpenAIClient } from '../config/openai';
import { config } from '../config/env';
import { GenerationError, errorMessage } from '../utils/errors';

/** Anything that can turn an instruction into a stream of text fragments. */
export interface GuideGenerator {
  streamGuide(prompt: string, styleInstruction: string): AsyncIterable<string>;
}

export class OpenAIService implements GuideGenerator {
  private client: OpenAI;
  private model: string;

  constructor(client: OpenAI = getOpenAIClient(), model: string = config.openai.model) {
    this.client = client;
    this.model = model;
  }

  async *streamGuide(prompt: string, styleInstruction: string): AsyncGenerator<string> {
    try {
      const stream = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: styleInstruction },
          { role: 'user', content: prompt },
        ],
        temperature: 0.6,
        max_tokens: 2000,
        stream: true,
      });

      for await (const chunk of stream) {
        const text = chunk.choices[0]?.delta?.content;
        if (text) {
          yield text;
        }
      }
    } catch (error) {
      throw new GenerationError(`Generation failed: ${errorMessage(error)}`);
    }
  }
}
