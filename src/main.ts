import { Command, InvalidArgumentError } from "commander";
import { randomUUID } from "crypto";
import { RunAssistUseCase } from "./application/assist/run-assist.usecase";
import { ResolveModelUseCase } from "./application/model-endpoint/resolve-model.usecase";
import { FileConfigAdapter } from "./adapters/config/file-config.adapter";
import { FileDocumentStoreAdapter } from "./adapters/document/file-document-store.adapter";
import { OpenAiChatClientAdapter } from "./adapters/openai/openai-chat-client.adapter";
import {
  SelectionRange,
  parseSelectionRange,
} from "./domain/assist/services/selection-policy";
import { runAssistCommand } from "./interaction/cli/commands/assist.command";
import { ChatCompletionPort } from "./ports/outbound/chat-completion.port";
import { ConfigPort } from "./ports/outbound/config.port";
import { DocumentStorePort } from "./ports/outbound/document.port";
import { toErrorMessage } from "./shared/errors/assist-errors";

function collectSelection(
  value: string,
  previous: SelectionRange[],
): SelectionRange[] {
  try {
    return [...previous, parseSelectionRange(value)];
  } catch (error) {
    throw new InvalidArgumentError(toErrorMessage(error));
  }
}

export function createProgram(deps?: {
  useCase?: RunAssistUseCase;
  chatClient?: ChatCompletionPort;
  config?: ConfigPort;
  documentStore?: DocumentStorePort;
}): Command {
  const config = deps?.config ?? new FileConfigAdapter();
  const chatClient = deps?.chatClient ?? new OpenAiChatClientAdapter(config);
  const documentStore = deps?.documentStore ?? new FileDocumentStoreAdapter();
  const resolver = new ResolveModelUseCase(config);
  const useCase =
    deps?.useCase ?? new RunAssistUseCase(config, resolver, chatClient);

  const program = new Command();

  program
    .name("assist")
    .description(
      "Send a document with its selections to a chat model and stream the reply into the document.",
    )
    .version("1.0.0");

  program
    .command("run <file>")
    .description("Run the assist command on a file.")
    .option(
      "-s, --select <start:end>",
      "Selected range as half-open character offsets (repeatable)",
      collectSelection,
      [],
    )
    .option("-m, --model <model_name>", "Model name to use")
    .option("--dry-run", "Print the resulting document instead of saving it")
    .option(
      "--log-events",
      "Enable local assist event logging (masked + rotated)",
    )
    .action(
      async (
        file: string,
        options: {
          select: SelectionRange[];
          model?: string;
          dryRun?: boolean;
          logEvents?: boolean;
        },
      ) => {
        try {
          await runAssistCommand(
            {
              filePath: file,
              selections: options.select,
              model: options.model,
              dryRun: Boolean(options.dryRun),
              enableEventLog: Boolean(options.logEvents),
            },
            {
              useCase,
              documentStore,
              createInvocationId: () => `assist-${randomUUID()}`,
            },
          );
        } catch (error) {
          console.error(
            `アシスト実行中にエラーが発生しました: ${toErrorMessage(error)}`,
          );
          process.exitCode = 1;
        }
      },
    );

  const modelCommand = program
    .command("model")
    .description("Default model settings.");

  modelCommand
    .command("show")
    .description("Show the default model.")
    .action(async () => {
      try {
        const model = await config.getDefaultModel();
        console.log(`デフォルトモデル: ${model}`);
      } catch (error) {
        console.error(`モデル設定の取得に失敗しました: ${toErrorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  modelCommand
    .command("use <model_name>")
    .description("Set default model.")
    .action(async (modelName: string) => {
      try {
        const trimmed = modelName.trim();
        if (!trimmed) {
          console.error("エラー: モデル名を指定してください。");
          process.exitCode = 1;
          return;
        }
        await config.setDefaultModel(trimmed);
        console.log(`デフォルトモデルを '${trimmed}' に設定しました。`);
      } catch (error) {
        console.error(`モデル設定に失敗しました: ${toErrorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
