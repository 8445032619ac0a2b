import { RunAssistUseCase } from "../../../application/assist/run-assist.usecase";
import { SelectionRange } from "../../../domain/assist/services/selection-policy";
import { DocumentStorePort } from "../../../ports/outbound/document.port";
import { ServiceError, toErrorMessage } from "../../../shared/errors/assist-errors";
import { ErrorPresenter } from "../../presenter/error-presenter";
import {
  AssistEventLogger,
  writeAssistEventLog,
} from "../../../operations/logging/assist-event-logger";

interface AssistCommandInput {
  filePath: string;
  selections: SelectionRange[];
  model?: string;
  dryRun?: boolean;
  enableEventLog?: boolean;
}

interface AssistCommandDeps {
  useCase: RunAssistUseCase;
  documentStore: DocumentStorePort;
  createInvocationId: () => string;
  logEvent?: AssistEventLogger;
}

export async function runAssistCommand(
  input: AssistCommandInput,
  deps: AssistCommandDeps,
): Promise<void> {
  const errorPresenter = new ErrorPresenter();
  const logEvent: AssistEventLogger = input.enableEventLog
    ? (deps.logEvent ?? writeAssistEventLog)
    : async () => {};
  const safeLog = async (
    ...args: Parameters<AssistEventLogger>
  ): Promise<void> => {
    try {
      await logEvent(...args);
    } catch (error) {
      console.error(`イベントログの書き込みに失敗しました: ${toErrorMessage(error)}`);
    }
  };

  const invocationId = deps.createInvocationId();
  const startedAt = Date.now();
  const document = await deps.documentStore.open(input.filePath);
  let streaming = false;
  // Counts streamed inserts; newline padding alone is never saved.
  let insertedDeltas = 0;

  try {
    const result = await deps.useCase.execute(
      {
        document,
        selections: input.selections,
        cliModel: input.model,
      },
      {
        onStart: () =>
          safeLog({
            timestamp: new Date().toISOString(),
            invocation_id: invocationId,
            event_type: "assist_started",
            document_path: input.filePath,
            model: input.model,
            selection_count: input.selections.length,
          }),
        onStreamStart: ({ model }) => {
          streaming = true;
          console.log(`Generating... (${model})`);
        },
        onInsert: (text) => {
          insertedDeltas += 1;
          if (!input.dryRun) {
            process.stdout.write(text);
          }
        },
      },
    );

    if (!result.ok) {
      // APIキー未設定時は何も表示せずに終了する
      return;
    }

    if (!input.dryRun) {
      process.stdout.write("\n");
    }
    console.log("Done.");

    await safeLog({
      timestamp: new Date().toISOString(),
      invocation_id: invocationId,
      event_type: "assist_completed",
      document_path: input.filePath,
      model: result.model,
      resolution_source: result.source,
      selection_count: input.selections.length,
      prompt: result.prompt,
      inserted_text: result.summary.insertedText,
      applied_deltas: result.summary.appliedDeltas,
      skipped_frames: result.summary.skippedFrames,
      finish_reason: result.summary.finishReason,
      total_tokens: result.summary.usage?.total_tokens,
      duration_ms: Date.now() - startedAt,
    });
  } catch (error) {
    if (streaming && !input.dryRun) {
      process.stdout.write("\n");
    }
    console.error(errorPresenter.present(error));
    process.exitCode = 1;

    await safeLog({
      timestamp: new Date().toISOString(),
      invocation_id: invocationId,
      event_type: "assist_failed",
      document_path: input.filePath,
      model: input.model,
      selection_count: input.selections.length,
      duration_ms: Date.now() - startedAt,
      error_name: error instanceof Error ? error.name : undefined,
      error_message: toErrorMessage(error),
      status_code: error instanceof ServiceError ? error.status : undefined,
    });
  } finally {
    // 途中で失敗しても、挿入済みのテキストは失わない
    if (insertedDeltas > 0) {
      if (input.dryRun) {
        process.stdout.write(document.snapshot().text());
      } else {
        await deps.documentStore.save(input.filePath, document);
      }
    }
  }
}
