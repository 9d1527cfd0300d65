import fs from 'fs/promises';
import path from 'path';
import { ChatOpenAI } from '@langchain/openai';
import { HumanMessage, MessageContent } from '@langchain/core/messages';
import type { OcrConfig } from '../configLoader';
import { asCollaboratorFailure } from '../errors';
import { log, LogLevel } from '../logger';

/** `full` reads the whole sheet for a slow-path extraction; `fast` re-reads names on the fast path. */
export type OcrTier = 'full' | 'fast';

/** Turns a frame image into the raw text of the model's reply. */
export interface OcrClient {
  extract(imagePath: string, tier: OcrTier): Promise<string>;
}

const MIME_BY_EXTENSION: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
};

export async function toImageDataUrl(imagePath: string): Promise<string> {
  const mime = MIME_BY_EXTENSION[path.extname(imagePath).toLowerCase()] ?? 'image/png';
  const bytes = await fs.readFile(imagePath);
  return `data:${mime};base64,${bytes.toString('base64')}`;
}

export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

/**
 * Vision OCR through an OpenAI-compatible chat model. The prompt is rebuilt
 * per call so it carries the current project list.
 */
export class LangChainOcrClient implements OcrClient {
  private readonly models: Record<OcrTier, ChatOpenAI>;

  constructor(
    config: OcrConfig,
    private readonly promptProvider: () => Promise<string>,
  ) {
    const build = (modelName: string) => new ChatOpenAI({
      modelName,
      temperature: config.temperature,
      openAIApiKey: config.apiKey || undefined,
      timeout: config.timeoutMs,
      configuration: config.baseUrl ? { baseURL: config.baseUrl } : undefined,
    });
    this.models = { full: build(config.fullModelName), fast: build(config.fastModelName) };
  }

  async extract(imagePath: string, tier: OcrTier): Promise<string> {
    try {
      const [prompt, imageUrl] = await Promise.all([this.promptProvider(), toImageDataUrl(imagePath)]);
      const message = new HumanMessage({
        content: [
          { type: 'text', text: prompt },
          { type: 'image_url', image_url: { url: imageUrl } },
        ],
      });
      const started = Date.now();
      const response = await this.models[tier].invoke([message]);
      log(LogLevel.DEBUG, `[OCR] ${tier} extraction of ${imagePath} took ${Date.now() - started}ms`);
      return contentToText(response.content);
    } catch (error) {
      throw asCollaboratorFailure('ocr', error);
    }
  }
}
