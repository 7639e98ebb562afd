import { z } from "zod";
import { Env, TranslatorUnavailableError } from "../../shared/src";

export type TranslationRequest = {
  system: string;
  user: string;
};

/** Anything that turns a request into a single line of free text. */
export interface IntentTranslator {
  readonly name: string;
  available(): boolean;
  translate(request: TranslationRequest): Promise<string>;
}

export const SYSTEM_PROMPT = `You classify requests for an Arch Linux machine.
Answer with exactly one line taken from this vocabulary:
install <package> [<package>...]
remove <package> [<package>...]
open <app>
fix sound | fix internet | fix bluetooth | fix time
upgrade system
clean cache
network status
logs <service>
unknown

Rules:
- Output the line only: no markdown, no explanation
- Never output shell commands, pipes, redirects or subshells
- Never output destructive operations (rm, dd, mkfs, chmod, chown)
- If nothing in the vocabulary fits, output: unknown`;

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

export type OpenAITranslatorOptions = {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetch?: typeof fetch;
};

export class OpenAITranslator implements IntentTranslator {
  readonly name = "openai";
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenAITranslatorOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  available(): boolean {
    return this.options.apiKey.length > 0;
  }

  async translate(request: TranslationRequest): Promise<string> {
    const url = `${this.options.baseUrl.replace(/\/+$/, "")}/chat/completions`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({
          model: this.options.model,
          temperature: 0,
          max_tokens: 32,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.user },
          ],
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new TranslatorUnavailableError(`translator request failed: ${message}`, { url });
    }

    if (!response.ok) {
      throw new TranslatorUnavailableError(`translator returned ${response.status}`, { url, status: response.status });
    }

    const parsed = chatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TranslatorUnavailableError("unexpected translator response", { issues: parsed.error.issues.length });
    }
    return parsed.data.choices[0].message.content ?? "";
  }
}

/** The OpenAI-compatible translator when a key is configured. */
export const translatorFromEnv = (env: Env): IntentTranslator | undefined =>
  env.OPENAI_API_KEY
    ? new OpenAITranslator({
        apiKey: env.OPENAI_API_KEY,
        baseUrl: env.PACWARDEN_LLM_BASE_URL,
        model: env.PACWARDEN_LLM_MODEL,
        timeoutMs: env.PACWARDEN_LLM_TIMEOUT_MS,
      })
    : undefined;

/** Deterministic translator: looks replies up by exact user text. */
export class StubTranslator implements IntentTranslator {
  readonly name = "stub";
  readonly requests: TranslationRequest[] = [];
  private readonly replies: Map<string, string>;

  constructor(replies: Record<string, string> = {}, private readonly fallback?: string) {
    this.replies = new Map(Object.entries(replies));
  }

  available(): boolean {
    return true;
  }

  async translate(request: TranslationRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.get(request.user) ?? this.fallback;
    if (reply === undefined) throw new TranslatorUnavailableError(`no stub reply for "${request.user}"`);
    return reply;
  }
}

/** First non-empty line of a reply, without code fences or backticks. */
export const firstReplyLine = (reply: string): string | undefined =>
  reply
    .split(/\r?\n/)
    .map((line) => line.replace(/^```\w*/, "").replace(/`/g, "").trim())
    .find((line) => line.length > 0);
