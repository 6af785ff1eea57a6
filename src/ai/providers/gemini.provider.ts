import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  GenerativeModel,
  GoogleGenerativeAI,
  HarmBlockThreshold,
  HarmCategory,
} from '@google/generative-ai';
import { describeError } from '@/common/errors/engagement.errors';
import { GenerateRequest, TextGenerator } from '../interfaces/text-generator.interface';

@Injectable()
export class GeminiProvider implements TextGenerator {
  private readonly logger = new Logger(GeminiProvider.name);
  private client?: GoogleGenerativeAI;

  constructor(private readonly configService: ConfigService) {}

  async generate(request: GenerateRequest): Promise<string> {
    const model = this.modelFor(request);
    try {
      const result = await model.generateContent(request.prompt);
      return result.response.text();
    } catch (error) {
      this.logger.error(`Gemini ${request.model} failed: ${describeError(error)}`);
      if (describeError(error).includes('SAFETY')) {
        throw new Error('Content blocked by safety filters.', { cause: error });
      }
      throw error;
    }
  }

  private modelFor(request: GenerateRequest): GenerativeModel {
    return this.getClient().getGenerativeModel(
      {
        model: request.model,
        systemInstruction: request.systemPrompt,
        safetySettings: [
          {
            category: HarmCategory.HARM_CATEGORY_HARASSMENT,
            threshold: HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE,
          },
          {
            category: HarmCategory.HARM_CATEGORY_HATE_SPEECH,
            threshold: HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE,
          },
        ],
        generationConfig: request.json ? { responseMimeType: 'application/json' } : undefined,
      },
      request.timeoutMs ? { timeout: request.timeoutMs } : undefined,
    );
  }

  // Created on first use so a run without relevance scoring or replies needs no key
  private getClient(): GoogleGenerativeAI {
    if (!this.client) {
      this.client = new GoogleGenerativeAI(this.configService.getOrThrow<string>('GEMINI_API_KEY'));
    }
    return this.client;
  }
}
