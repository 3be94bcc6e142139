import { z } from 'zod';
import type { LlmConfig } from '../config/app.js';
import { allowHost, fetchJSON } from '../util/fetch.js';
import { withResilience } from '../util/resilience.js';
import type { Logger } from '../util/logging.js';

const ChatCompletion = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

/**
 * Try to extract a JSON object from an LLM response safely.
 * Returns undefined if no valid JSON object can be found.
 */
export function safeExtractJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // fall through to the embedded-object scan
  }
  const m = text.match(/\{[\s\S]*\}/);
  if (!m) return undefined;
  try {
    return JSON.parse(m[0]);
  } catch {
    return undefined;
  }
}

export interface TextGenerator {
  complete(prompt: string, opts?: { json?: boolean; signal?: AbortSignal }): Promise<string>;
}

/**
 * Minimal client for an OpenAI-compatible chat completions endpoint.
 */
export class LlmClient implements TextGenerator {
  private readonly url: string;

  constructor(
    private readonly config: LlmConfig,
    private readonly log: Logger,
  ) {
    const base = config.baseUrl.replace(/\/$/, '');
    this.url = `${base}/chat/completions`;
    allowHost(new URL(base).hostname);
  }

  async complete(prompt: string, opts: { json?: boolean; signal?: AbortSignal } = {}): Promise<string> {
    if (!prompt.trim()) throw new Error('empty_prompt');
    const body = {
      model: this.config.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: opts.json ? 0 : 0.3,
      ...(opts.json ? { response_format: { type: 'json_object' } } : {}),
    };
    const start = Date.now();
    const raw = await withResilience(
      'llm',
      (signal) =>
        fetchJSON(this.url, {
          method: 'POST',
          body,
          headers: { Authorization: `Bearer ${this.config.apiKey}` },
          timeoutMs: this.config.timeoutMs,
          retries: 0,
          target: 'llm',
          signal,
        }),
      opts.signal,
    );
    const parsed = ChatCompletion.safeParse(raw);
    const content = parsed.success ? parsed.data.choices[0]?.message.content?.trim() : undefined;
    if (!content) throw new Error('llm_empty_response');
    this.log.debug({ model: this.config.model, ms: Date.now() - start, chars: content.length }, 'LLM completion');
    return content;
  }
}
