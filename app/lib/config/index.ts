import { existsSync } from "fs";
import { readFile, writeFile } from "fs/promises";
import { resolve } from "path";

/**
 * The config file is free-form JSON; only the parts the server reads back
 * (LLM and embedding profiles) are narrowed below.
 */
export type ConfigData = Record<string, unknown>;

export interface LlmProfile {
  api_key: string;
  base_url: string;
  model_name: string;
  temperature: number;
  max_tokens: number;
  /** Seconds */
  timeout: number;
  interface_format: string;
}

export interface EmbeddingProfile {
  api_key: string;
  base_url: string;
  model_name: string;
  retrieval_k: number;
  interface_format: string;
}

const DEFAULT_CONFIG_URL = new URL("./default-config.json", import.meta.url);

export function configFilePath(): string {
  return resolve(process.cwd(), process.env.NOVEL_CONFIG_FILE || "config.json");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function defaultConfig(): Promise<ConfigData> {
  const parsed: unknown = JSON.parse(await readFile(DEFAULT_CONFIG_URL, "utf-8"));
  if (!isRecord(parsed)) {
    throw new Error("default-config.json must contain a JSON object");
  }
  return parsed;
}

/**
 * Load the config at `configFile`.
 * A missing or unparseable file is replaced with the defaults; a file holding
 * something other than an object, or one that cannot be read, yields `{}`.
 */
export async function loadConfig(configFile: string): Promise<ConfigData> {
  if (!existsSync(configFile)) {
    return createConfig(configFile);
  }

  let raw: string;
  try {
    raw = await readFile(configFile, "utf-8");
  } catch (error) {
    console.error(`[Config] Failed to read ${configFile}:`, error instanceof Error ? error.message : error);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    console.error(`[Config] Invalid JSON in ${configFile}, recreating defaults:`, error instanceof Error ? error.message : error);
    return createConfig(configFile);
  }

  if (!isRecord(parsed)) {
    console.error(`[Config] ${configFile} does not contain a JSON object`);
    return {};
  }
  return parsed;
}

/**
 * Write the default config to `configFile` and return it.
 */
export async function createConfig(configFile: string): Promise<ConfigData> {
  const config = await defaultConfig();
  if (await saveConfig(config, configFile)) {
    console.log(`[Config] Created default config at ${configFile}`);
  }
  return config;
}

export async function saveConfig(config: ConfigData, configFile: string): Promise<boolean> {
  try {
    await writeFile(configFile, JSON.stringify(config, null, 4), "utf-8");
    return true;
  } catch (error) {
    console.error(`[Config] Failed to save ${configFile}:`, error instanceof Error ? error.message : error);
    return false;
  }
}

function stringField(source: Record<string, unknown>, key: string, fallback = ""): string {
  const value = source[key];
  return typeof value === "string" ? value : fallback;
}

function numberField(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return fallback;
}

export function parseLlmProfile(value: unknown): LlmProfile | null {
  if (!isRecord(value)) return null;
  const baseUrl = stringField(value, "base_url");
  const modelName = stringField(value, "model_name");
  if (!baseUrl || !modelName) return null;

  return {
    api_key: stringField(value, "api_key"),
    base_url: baseUrl,
    model_name: modelName,
    temperature: numberField(value, "temperature", 0.7),
    max_tokens: numberField(value, "max_tokens", 8192),
    timeout: numberField(value, "timeout", 600),
    interface_format: stringField(value, "interface_format", "OpenAI"),
  };
}

export function parseEmbeddingProfile(value: unknown): EmbeddingProfile | null {
  if (!isRecord(value)) return null;
  const baseUrl = stringField(value, "base_url");
  const modelName = stringField(value, "model_name");
  if (!baseUrl || !modelName) return null;

  return {
    api_key: stringField(value, "api_key"),
    base_url: baseUrl,
    model_name: modelName,
    retrieval_k: numberField(value, "retrieval_k", 4),
    interface_format: stringField(value, "interface_format", "OpenAI"),
  };
}

function section(config: ConfigData, key: string): Record<string, unknown> {
  const value = config[key];
  return isRecord(value) ? value : {};
}

export function getLlmProfile(config: ConfigData, name: string): LlmProfile | null {
  return parseLlmProfile(section(config, "llm_configs")[name]);
}

export function getEmbeddingProfile(config: ConfigData, name: string): EmbeddingProfile | null {
  return parseEmbeddingProfile(section(config, "embedding_configs")[name]);
}
