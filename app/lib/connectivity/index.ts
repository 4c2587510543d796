import type { EmbeddingProfile, LlmProfile } from "../config";
import { isRecord } from "../config";

const LLM_TEST_PROMPT = "Please reply 'OK'";
const EMBEDDING_TEST_TEXT = "测试文本";

/**
 * Result of a connectivity smoke test
 */
export interface ConnectivityResult {
  success: boolean;
  reply?: string;
  dimensions?: number;
  error?: string;
}

export type LogFn = (message: string) => void;

function isOllama(interfaceFormat: string): boolean {
  return interfaceFormat.trim().toLowerCase() === "ollama";
}

function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${path}`;
}

/** Ollama's native API lives at the server root, not under the OpenAI-style /v1 */
function ollamaRoot(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "").replace(/\/v1$/, "");
}

async function postJson(url: string, apiKey: string, body: unknown, timeoutMs: number): Promise<unknown> {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (apiKey) {
    headers.Authorization = `Bearer ${apiKey}`;
  }

  const response = await fetch(url, {
    method: "POST",
    headers,
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    throw new Error(`HTTP ${response.status}${text ? `: ${text.slice(0, 200)}` : ""}`);
  }

  return response.json();
}

function extractChatReply(data: unknown): string | null {
  if (!isRecord(data)) return null;

  // OpenAI-compatible: { choices: [{ message: { content } }] }
  const choices = data.choices;
  if (Array.isArray(choices) && isRecord(choices[0]) && isRecord(choices[0].message)) {
    const content = choices[0].message.content;
    if (typeof content === "string") return content;
  }

  // Ollama: { message: { content } }
  if (isRecord(data.message) && typeof data.message.content === "string") {
    return data.message.content;
  }

  return null;
}

function extractEmbedding(data: unknown): number[] | null {
  if (!isRecord(data)) return null;

  const vector = Array.isArray(data.data) && isRecord(data.data[0]) ? data.data[0].embedding : data.embedding;
  if (!Array.isArray(vector)) return null;
  return vector.filter((v): v is number => typeof v === "number");
}

/**
 * Send a one-line prompt to the configured model and report whether a
 * non-empty reply came back.
 */
export async function testLlmConfig(profile: LlmProfile, log: LogFn): Promise<ConnectivityResult> {
  log("Testing LLM configuration...");
  const timeoutMs = Math.max(1, profile.timeout) * 1000;
  const messages = [{ role: "user", content: LLM_TEST_PROMPT }];

  try {
    const data = isOllama(profile.interface_format)
      ? await postJson(joinUrl(ollamaRoot(profile.base_url), "/api/chat"), profile.api_key, {
          model: profile.model_name,
          messages,
          stream: false,
          options: { temperature: profile.temperature, num_predict: profile.max_tokens },
        }, timeoutMs)
      : await postJson(joinUrl(profile.base_url, "/chat/completions"), profile.api_key, {
          model: profile.model_name,
          messages,
          temperature: profile.temperature,
          max_tokens: profile.max_tokens,
        }, timeoutMs);

    const reply = extractChatReply(data);
    if (!reply) {
      log("LLM configuration test failed: no response received");
      return { success: false, error: "No response received" };
    }

    log("LLM configuration test succeeded");
    log(`Reply: ${reply}`);
    return { success: true, reply };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log(`LLM configuration test error: ${message}`);
    return { success: false, error: message };
  }
}

/**
 * Embed a short sample text and report the vector dimension.
 */
export async function testEmbeddingConfig(profile: EmbeddingProfile, log: LogFn): Promise<ConnectivityResult> {
  log("Testing embedding configuration...");

  try {
    const data = isOllama(profile.interface_format)
      ? await postJson(joinUrl(ollamaRoot(profile.base_url), "/api/embeddings"), profile.api_key, {
          model: profile.model_name,
          prompt: EMBEDDING_TEST_TEXT,
        }, 60_000)
      : await postJson(joinUrl(profile.base_url, "/embeddings"), profile.api_key, {
          model: profile.model_name,
          input: EMBEDDING_TEST_TEXT,
        }, 60_000);

    const embedding = extractEmbedding(data);
    if (!embedding || embedding.length === 0) {
      log("Embedding configuration test failed: no vector returned");
      return { success: false, error: "No vector returned" };
    }

    log("Embedding configuration test succeeded");
    log(`Vector dimensions: ${embedding.length}`);
    return { success: true, dimensions: embedding.length };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log(`Embedding configuration test error: ${message}`);
    return { success: false, error: message };
  }
}
