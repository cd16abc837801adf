import { StructuredOutputDecodeError } from './errors.js';
import { getLogger } from './logger.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type RepairFunction = (content: string) => Promise<string>;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Extracts a JSON object from free-form model output. Handles bare JSON,
 * JSON wrapped in prose or code fences, and falls back to a single repair
 * round through the supplied callback.
 */
export class StructuredOutputParser {
  tryParse(content: string): JsonObject | null {
    if (!content || !content.trim()) {
      return null;
    }

    const direct = this.parseObject(content);
    if (direct) {
      return direct;
    }

    const start = content.indexOf('{');
    const end = content.lastIndexOf('}');
    if (start === -1 || end === -1 || end <= start) {
      getLogger()?.debug('StructuredOutputParser', 'No JSON object delimiters found in response');
      return null;
    }

    return this.parseObject(content.substring(start, end + 1));
  }

  async parse(content: string, repair: RepairFunction): Promise<JsonObject> {
    const parsed = this.tryParse(content);
    if (parsed) {
      return parsed;
    }

    getLogger()?.warn(
      'StructuredOutputParser',
      `Response is not valid JSON, requesting repair. Raw output (first 200 chars): ${content.substring(0, 200)}`
    );

    const repaired = await repair(content);
    const reparsed = this.tryParse(repaired);
    if (reparsed) {
      return reparsed;
    }

    getLogger()?.error('StructuredOutputParser', 'Failed to parse structured response after repair');
    throw new StructuredOutputDecodeError('Invalid JSON after repair', content);
  }

  private parseObject(text: string): JsonObject | null {
    try {
      const parsed: unknown = JSON.parse(text);
      return isJsonObject(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }
}
