import { resolveModelByPriority } from "../../domain/model-endpoint/services/model-resolution-policy";
import { ConfigPort } from "../../ports/outbound/config.port";
import { ModelResolutionSource } from "../../shared/types/chat";

export interface ResolveModelInput {
  cliModel?: string;
}

export interface ResolveModelOutput {
  model: string;
  source: ModelResolutionSource;
}

export class ResolveModelUseCase {
  constructor(private readonly config: ConfigPort) {}

  async execute(input: ResolveModelInput): Promise<ResolveModelOutput> {
    const defaultModel = await this.config.getDefaultModel();

    return resolveModelByPriority({
      cliModel: input.cliModel,
      defaultModel,
    });
  }
}
