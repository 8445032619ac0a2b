import axios, { AxiosResponse } from "axios";
import { ChatCompletionPort } from "../../ports/outbound/chat-completion.port";
import { ConfigPort } from "../../ports/outbound/config.port";
import { UnboundedChannel } from "../../shared/async/unbounded-channel";
import {
  SerializationError,
  ServiceError,
  TransportError,
  errorCode,
  toErrorMessage,
} from "../../shared/errors/assist-errors";
import { ChatRequest, StreamItem } from "../../shared/types/chat";
import { Logger, logger as defaultLogger } from "../../utils/logger";
import { StreamBody, decodeEventStream } from "./event-stream-decoder";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

export function toChatCompletionsEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/chat/completions`;
}

export class OpenAiChatClientAdapter implements ChatCompletionPort {
  constructor(
    private readonly config: Pick<ConfigPort, "getBaseUrl">,
    private readonly logger: Logger = defaultLogger,
  ) {}

  async streamCompletion(
    apiKey: string,
    request: ChatRequest,
  ): Promise<AsyncIterable<StreamItem>> {
    const body = this.serialize({ ...request, stream: true });
    const endpoint = toChatCompletionsEndpoint(await this.config.getBaseUrl());

    let response: AxiosResponse<StreamBody>;
    try {
      response = await axios.post<StreamBody>(endpoint, body, {
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${apiKey}`,
        },
        responseType: "stream",
        // ステータスはこちらで判定する
        validateStatus: () => true,
      });
    } catch (error) {
      this.handleAxiosError(error, endpoint);
    }

    if (response.status !== 200) {
      const text = await this.drainBody(response.data);
      throw new ServiceError(response.status, text);
    }

    await this.logger.debug(
      `chat completion stream opened: endpoint=${endpoint}, model=${request.model}`,
    );
    const channel = new UnboundedChannel<StreamItem>();
    // decodeEventStream never rejects; it reports failures on the channel.
    void decodeEventStream(response.data, channel, this.logger);
    return channel;
  }

  private serialize(request: ChatRequest): string {
    try {
      return JSON.stringify(request);
    } catch (error) {
      throw new SerializationError(
        `リクエストのシリアライズに失敗しました: ${toErrorMessage(error)}`,
      );
    }
  }

  private async drainBody(body: StreamBody): Promise<string> {
    const decoder = new TextDecoder("utf-8");
    let text = "";
    try {
      for await (const chunk of body) {
        text +=
          typeof chunk === "string"
            ? chunk
            : decoder.decode(chunk, { stream: true });
      }
      return text + decoder.decode();
    } catch (error) {
      throw new TransportError(
        `エラーレスポンスの読み取りに失敗しました: ${toErrorMessage(error)}`,
        errorCode(error),
      );
    }
  }

  private handleAxiosError(error: unknown, endpoint: string): never {
    if (axios.isAxiosError(error)) {
      if (error.code === "ECONNREFUSED") {
        throw new TransportError(
          `APIサーバーに接続できません。エンドポイント: ${endpoint} を確認してください。`,
          error.code,
        );
      }
      if (error.code === "ETIMEDOUT" || error.code === "ECONNABORTED") {
        throw new TransportError(
          `APIサーバーへの接続がタイムアウトしました。エンドポイント: ${endpoint}`,
          error.code,
        );
      }
      if (error.code === "ENOTFOUND" || error.code === "EAI_AGAIN") {
        throw new TransportError(
          `APIサーバーのホスト名を解決できません。エンドポイント: ${endpoint}`,
          error.code,
        );
      }
      throw new TransportError(`ネットワークエラー: ${error.message}`, error.code);
    }
    throw new TransportError(
      `ネットワークエラー: ${toErrorMessage(error)}`,
      errorCode(error),
    );
  }
}
