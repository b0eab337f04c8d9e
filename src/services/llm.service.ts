/**
 * Remote completion client: the single network-facing collaborator.
 * Every problem reaching or parsing the model collapses into RemoteCallError.
 */
import OpenAI from "openai";

export type CompletionRequest = {
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
};

export interface CompletionClient {
  readonly model: string;
  /**
   * Rejects with RemoteCallError on any failure.
   */
  complete(request: CompletionRequest): Promise<string>;
}

export type RemoteOutcome =
  | { ok: true; text: string }
  | { ok: false; reason: string };

export class RemoteCallError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RemoteCallError";
  }
}

export const DEFAULT_MODEL = "gpt-3.5-turbo";
export const DEFAULT_TIMEOUT_MS = 5000;

export type OpenAiClientOptions = {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  baseURL?: string;
};

/**
 * Chat-completions client with a bounded timeout and no SDK-level retries:
 * one attempt, then the caller falls back.
 */
export class OpenAiCompletionClient implements CompletionClient {
  readonly model: string;
  private readonly timeoutMs: number;
  private readonly client: OpenAI;

  constructor(options: OpenAiClientOptions) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions
      .create(
        {
          model: this.model,
          messages: [
            { role: "system", content: request.systemPrompt },
            { role: "user", content: request.userPrompt },
          ],
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        },
        { timeout: this.timeoutMs, maxRetries: 0 }
      )
      .catch((err: unknown) => {
        throw new RemoteCallError(
          `Chat completion request failed: ${describeError(err)}`,
          { cause: err }
        );
      });

    const text = response.choices?.[0]?.message?.content;
    if (typeof text !== "string" || text.trim().length === 0) {
      throw new RemoteCallError("Chat completion returned no content");
    }
    return text.trim();
  }
}

/**
 * Stand-in used when no API key is configured, so a missing credential
 * takes the same path as any other remote failure.
 */
export class MissingCredentialClient implements CompletionClient {
  constructor(readonly model: string = DEFAULT_MODEL) {}

  async complete(_request: CompletionRequest): Promise<string> {
    throw new RemoteCallError("OpenAI API key not found");
  }
}

export function createCompletionClient(config: {
  openAiApiKey: string | null;
  openAiModel: string;
  llmTimeoutMs: number;
}): CompletionClient {
  if (!config.openAiApiKey) {
    return new MissingCredentialClient(config.openAiModel);
  }
  return new OpenAiCompletionClient({
    apiKey: config.openAiApiKey,
    model: config.openAiModel,
    timeoutMs: config.llmTimeoutMs,
  });
}

/**
 * Single attempt, no retry. Never rejects.
 */
export async function attemptRemoteCompletion(
  client: CompletionClient,
  request: CompletionRequest
): Promise<RemoteOutcome> {
  try {
    const text = await client.complete(request);
    return { ok: true, text };
  } catch (err) {
    return { ok: false, reason: describeError(err) };
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
