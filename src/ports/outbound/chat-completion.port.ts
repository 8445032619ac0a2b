import { ChatRequest, StreamItem } from "../../shared/types/chat";

export interface ChatCompletionPort {
  /**
   * Resolves once the response status is known. The returned sequence keeps
   * filling in the background until the response body ends.
   */
  streamCompletion(
    apiKey: string,
    request: ChatRequest,
  ): Promise<AsyncIterable<StreamItem>>;
}
