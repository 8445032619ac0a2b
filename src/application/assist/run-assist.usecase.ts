import { ResolveModelUseCase } from "../model-endpoint/resolve-model.usecase";
import { frameSelections } from "../../domain/assist/services/selection-framer";
import {
  SelectionRange,
  normalizeSelections,
} from "../../domain/assist/services/selection-policy";
import { ASSIST_SYSTEM_MESSAGE } from "../../domain/assist/system-prompt";
import { ChatCompletionPort } from "../../ports/outbound/chat-completion.port";
import { ConfigPort } from "../../ports/outbound/config.port";
import { EditableDocument } from "../../ports/outbound/document.port";
import { ConfigurationError } from "../../shared/errors/assist-errors";
import { ChatRequest, ModelResolutionSource } from "../../shared/types/chat";
import { Logger, logger as defaultLogger } from "../../utils/logger";
import { InsertionSummary, drainIntoDocument } from "./insertion-sink";

export interface AssistInput {
  document: EditableDocument;
  selections: readonly SelectionRange[];
  cliModel?: string;
}

export interface AssistHooks {
  /** Called once an API key is known to be present, before any edit or request. */
  onStart?: () => Promise<void> | void;
  /** Called once the request is accepted, before the first delta arrives. */
  onStreamStart?: (info: { model: string; prompt: string }) => void;
  onInsert?: (text: string) => void;
}

export interface AssistSuccess {
  ok: true;
  model: string;
  source: ModelResolutionSource;
  prompt: string;
  summary: InsertionSummary;
}

export interface AssistDeclined {
  ok: false;
  code: "MISSING_API_KEY";
  error: ConfigurationError;
}

export type AssistResult = AssistSuccess | AssistDeclined;

export function buildAssistRequest(model: string, userMessage: string): ChatRequest {
  return {
    model,
    messages: [
      { role: "system", content: ASSIST_SYSTEM_MESSAGE },
      { role: "user", content: userMessage },
    ],
    stream: true,
  };
}

export class RunAssistUseCase {
  constructor(
    private readonly config: ConfigPort,
    private readonly resolver: ResolveModelUseCase,
    private readonly chatClient: ChatCompletionPort,
    private readonly logger: Logger = defaultLogger,
  ) {}

  async execute(input: AssistInput, hooks: AssistHooks = {}): Promise<AssistResult> {
    const apiKey = await this.config.getApiKey();
    if (!apiKey) {
      const error = new ConfigurationError(
        "OPENAI_API_KEY is not set; assist declined.",
      );
      await this.logger.debug(error.message);
      return { ok: false, code: "MISSING_API_KEY", error };
    }
    await hooks.onStart?.();

    const resolved = await this.resolver.execute({ cliModel: input.cliModel });
    const selections = normalizeSelections(
      input.selections,
      input.document.snapshot().length,
    );
    const { userMessage, insertionSite } = frameSelections(
      input.document,
      selections,
    );

    const items = await this.chatClient.streamCompletion(
      apiKey,
      buildAssistRequest(resolved.model, userMessage),
    );
    hooks.onStreamStart?.({ model: resolved.model, prompt: userMessage });

    const summary = await drainIntoDocument(input.document, insertionSite, items, {
      onInsert: hooks.onInsert,
      logger: this.logger,
    });
    await this.logger.info(
      `assist completed: model=${resolved.model}, deltas=${summary.appliedDeltas}, skipped_frames=${summary.skippedFrames}`,
    );

    return {
      ok: true,
      model: resolved.model,
      source: resolved.source,
      prompt: userMessage,
      summary,
    };
  }
}
