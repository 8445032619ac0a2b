import { ConfigurationError } from "../../../shared/errors/assist-errors";
import { ModelResolutionSource } from "../../../shared/types/chat";

export interface ModelResolutionInput {
  cliModel?: string;
  defaultModel: string;
}

export interface ModelResolutionResult {
  model: string;
  source: ModelResolutionSource;
}

// Highest priority first.
const PRIORITY: readonly ModelResolutionSource[] = ["cli", "default"];

export function resolveModelByPriority(
  input: ModelResolutionInput,
): ModelResolutionResult {
  const candidates: Record<ModelResolutionSource, string | undefined> = {
    cli: input.cliModel,
    default: input.defaultModel,
  };

  for (const source of PRIORITY) {
    const model = candidates[source]?.trim();
    if (model) {
      return { model, source };
    }
  }

  throw new ConfigurationError(
    "モデルを決定できません: デフォルトモデルが空です。`assist model use <model_name>` で設定してください。",
  );
}
