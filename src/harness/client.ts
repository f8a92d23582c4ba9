export interface StackResponse {
  status: number;
  ok: boolean;
  body: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: { role: "user" | "assistant" | "system"; content: string }[];
  max_tokens: number;
  temperature: number;
}

export interface StackClientOptions {
  fetch?: typeof fetch;
  requestTimeoutMs?: number;
  inferenceTimeoutMs?: number;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 5_000;
// Generation on an emulated or cold backend can take minutes
const DEFAULT_INFERENCE_TIMEOUT_MS = 600_000;

/** Thin text-level client for the stack's OpenAI-compatible HTTP API. */
export class StackClient {
  readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly requestTimeoutMs: number;
  private readonly inferenceTimeoutMs: number;

  constructor(baseUrl: string, options: StackClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/$/, "");
    this.fetchImpl = options.fetch ?? fetch;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.inferenceTimeoutMs = options.inferenceTimeoutMs ?? DEFAULT_INFERENCE_TIMEOUT_MS;
  }

  health(): Promise<StackResponse> {
    return this.request("/v1/health", { method: "GET" }, this.requestTimeoutMs);
  }

  listModels(): Promise<StackResponse> {
    return this.request("/v1/models", { method: "GET" }, this.requestTimeoutMs);
  }

  chatCompletion(body: ChatCompletionRequest): Promise<StackResponse> {
    return this.request(
      "/v1/chat/completions",
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      },
      this.inferenceTimeoutMs,
    );
  }

  private async request(path: string, init: RequestInit, timeoutMs: number): Promise<StackResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
    });
    const body = await response.text();
    return { status: response.status, ok: response.ok, body };
  }
}
