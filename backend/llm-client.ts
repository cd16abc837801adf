import type { LLMSettings } from './config.js';
import { ConfigError, LLMRequestError, describeError } from './errors.js';
import { getLogger } from './logger.js';
import { StructuredOutputParser, type JsonObject } from './structured-output.js';

export interface LLMClient {
  generate(prompt: string, system?: string): Promise<string>;
  generateStructured(prompt: string, system?: string): Promise<JsonObject>;
}

export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

const MAX_ATTEMPTS = 3;
const REQUEST_TIMEOUT_MS = 60_000;
const DEFAULT_RATE_LIMIT_WAIT_MS = 5_000;

export const REPAIR_SYSTEM_PROMPT = 'Return only valid JSON.';

export function buildRepairPrompt(content: string): string {
  return (
    'Fix the following content to valid JSON. ' +
    'Return only the JSON object and nothing else.\n\n' +
    `Content:\n${content}`
  );
}

export interface OpenAICompatibleClientOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  referer?: string;
  title?: string;
  timeoutMs?: number;
  fetch?: FetchFunction;
  sleep?: (ms: number) => Promise<void>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Chat-completions client for OpenAI and compatible endpoints (OpenRouter, vLLM, llama-server). */
export class OpenAICompatibleClient implements LLMClient {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly endpoint: string;
  private readonly extraHeaders: Record<string, string> = {};
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFunction;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly parser = new StructuredOutputParser();

  constructor(options: OpenAICompatibleClientOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.endpoint = (options.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    if (options.referer) {
      this.extraHeaders['HTTP-Referer'] = options.referer;
    }
    if (options.title) {
      this.extraHeaders['X-Title'] = options.title;
    }
  }

  async generate(prompt: string, system?: string): Promise<string> {
    const messages = this.buildMessages(prompt, system);
    let lastError: unknown = new LLMRequestError('POST /chat/completions failed without response');

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        return await this.complete(messages);
      } catch (error) {
        lastError = error;
        if (error instanceof LLMRequestError && !error.retryable) {
          throw error;
        }
        if (attempt === MAX_ATTEMPTS) {
          break;
        }
        if (error instanceof LLMRequestError && error.retryAfterMs !== undefined) {
          getLogger()?.warn('LLMClient', `Rate limited. Sleeping for ${Math.round(error.retryAfterMs / 1000)} seconds.`);
          await this.sleep(error.retryAfterMs);
          continue;
        }
        getLogger()?.warn(
          'LLMClient',
          `LLM request failed (${describeError(error)}), retrying (attempt ${attempt + 1}/${MAX_ATTEMPTS})`
        );
      }
    }

    throw lastError;
  }

  async generateStructured(prompt: string, system?: string): Promise<JsonObject> {
    let content: string;
    try {
      content = await this.complete(this.buildMessages(prompt, system), { type: 'json_object' });
    } catch (error) {
      getLogger()?.warn('LLMClient', `Structured response_format failed: ${describeError(error)}`);
      content = await this.generate(prompt, system);
    }

    return this.parser.parse(content, raw => this.generate(buildRepairPrompt(raw), REPAIR_SYSTEM_PROMPT));
  }

  private buildMessages(prompt: string, system?: string): ChatMessage[] {
    const messages: ChatMessage[] = [];
    if (system) {
      messages.push({ role: 'system', content: system });
    }
    messages.push({ role: 'user', content: prompt });
    return messages;
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.apiKey}`,
      ...this.extraHeaders,
    };
  }

  private async complete(
    messages: ChatMessage[],
    responseFormat?: { type: 'json_object' },
  ): Promise<string> {
    const url = `${this.endpoint}/chat/completions`;
    const response = await this.post(url, JSON.stringify({
      model: this.model,
      messages,
      ...(responseFormat ? { response_format: responseFormat } : {}),
    }));

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new LLMRequestError(
        `POST /chat/completions failed: ${response.status} ${response.statusText}${text ? `\n${text.slice(0, 2000)}` : ''}`,
        response.status,
        response.status === 429 || response.status === 408 || response.status >= 500,
        response.status === 429 ? this.rateLimitWait(response) : undefined,
      );
    }

    const payload: unknown = await response.json();
    this.logUsage(payload);
    return this.extractContent(payload);
  }

  private async post(url: string, body: string): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.fetchImpl(url, {
        method: 'POST',
        headers: this.headers(),
        body,
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new LLMRequestError(`Request to ${url} timed out after ${this.timeoutMs}ms`, undefined, true);
      }
      throw new LLMRequestError(`Connection failure to ${url}: ${describeError(error)}`, undefined, true);
    } finally {
      clearTimeout(timer);
    }
  }

  private rateLimitWait(response: Response): number {
    const retryAfter = response.headers.get('retry-after');
    if (retryAfter && /^\d+$/.test(retryAfter.trim())) {
      return Math.max(1, Number(retryAfter.trim())) * 1000;
    }
    return DEFAULT_RATE_LIMIT_WAIT_MS;
  }

  private extractContent(payload: unknown): string {
    if (!isRecord(payload) || !Array.isArray(payload.choices) || payload.choices.length === 0) {
      throw new LLMRequestError('Chat completion response contained no choices', undefined, true);
    }
    const choice: unknown = payload.choices[0];
    if (!isRecord(choice) || !isRecord(choice.message)) {
      return '';
    }
    return typeof choice.message.content === 'string' ? choice.message.content : '';
  }

  private logUsage(payload: unknown): void {
    if (!isRecord(payload) || !isRecord(payload.usage)) {
      return;
    }
    const usage = payload.usage;
    getLogger()?.info(
      'LLMClient',
      `LLM usage: prompt=${String(usage.prompt_tokens)} completion=${String(usage.completion_tokens)} total=${String(usage.total_tokens)}`
    );
  }
}

export function createLLMClient(settings: LLMSettings, overrides: Partial<OpenAICompatibleClientOptions> = {}): LLMClient {
  if (!settings.apiKey) {
    throw new ConfigError('LLM API key not provided. Set OPENAI_API_KEY or llm.api_key in the configuration file.');
  }
  return new OpenAICompatibleClient({
    apiKey: settings.apiKey,
    model: settings.model,
    baseUrl: settings.baseUrl,
    referer: settings.referer,
    title: settings.title,
    ...overrides,
  });
}
