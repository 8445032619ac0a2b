export interface ConfigPort {
  getDefaultModel(): Promise<string>;
  setDefaultModel(model: string): Promise<void>;
  getApiKey(): Promise<string | undefined>;
  getBaseUrl(): Promise<string>;
}
