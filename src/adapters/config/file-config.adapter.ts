import * as fs from "fs";
import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigPort } from "../../ports/outbound/config.port";
import { errorCode } from "../../shared/errors/assist-errors";
import { DEFAULT_OPENAI_BASE_URL } from "../openai/openai-chat-client.adapter";

interface StoredConfig {
  defaultModel?: string;
  baseUrl?: string;
}

export function resolveConfigDir(): string {
  return (
    process.env.ASSIST_CONFIG_DIR?.trim() ||
    path.join(os.homedir(), ".selection-assist-cli")
  );
}

export class FileConfigAdapter implements ConfigPort {
  constructor(
    private readonly fallbackModel: string = "gpt-4",
    private readonly configDir: string = resolveConfigDir(),
  ) {}

  private get configFile(): string {
    return path.join(this.configDir, "config.json");
  }

  async getDefaultModel(): Promise<string> {
    const envModel = process.env.ASSIST_MODEL?.trim();
    if (envModel) {
      return envModel;
    }

    const data = await this.readConfig();
    return data.defaultModel?.trim() || this.fallbackModel;
  }

  async setDefaultModel(model: string): Promise<void> {
    const current = await this.readConfig();
    const next: StoredConfig = {
      ...current,
      defaultModel: model,
    };

    await fsp.mkdir(this.configDir, { recursive: true });
    await fsp.writeFile(this.configFile, JSON.stringify(next, null, 2), "utf-8");
  }

  async getApiKey(): Promise<string | undefined> {
    return process.env.OPENAI_API_KEY?.trim() || undefined;
  }

  async getBaseUrl(): Promise<string> {
    const envUrl = process.env.OPENAI_BASE_URL?.trim();
    if (envUrl) {
      return envUrl;
    }

    const data = await this.readConfig();
    return data.baseUrl?.trim() || DEFAULT_OPENAI_BASE_URL;
  }

  private async readConfig(): Promise<StoredConfig> {
    try {
      if (!fs.existsSync(this.configFile)) {
        return {};
      }

      const raw = await fsp.readFile(this.configFile, "utf-8");
      const parsed: unknown = JSON.parse(raw);
      return toStoredConfig(parsed);
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return {};
      }
      console.error("設定ファイルの読み込みに失敗しました:", error);
      return {};
    }
  }
}

function toStoredConfig(value: unknown): StoredConfig {
  if (typeof value !== "object" || value === null) {
    return {};
  }
  const config: StoredConfig = {};
  if ("defaultModel" in value && typeof value.defaultModel === "string") {
    config.defaultModel = value.defaultModel;
  }
  if ("baseUrl" in value && typeof value.baseUrl === "string") {
    config.baseUrl = value.baseUrl;
  }
  return config;
}
