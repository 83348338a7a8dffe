import OpenAI from "openai";
import { config } from "../config";
import { EmptyOutputError } from "../errors";

const statusOf = (error: unknown): number | undefined =>
  error instanceof OpenAI.APIError && typeof error.status === "number" ? error.status : undefined;

export class OpenAiClient {
  private readonly client: OpenAI;
  private modelValidationPromise?: Promise<void>;

  constructor(private readonly model = config.model) {
    this.client = new OpenAI({
      apiKey: config.openaiApiKey,
      baseURL: config.openaiBaseUrl,
      maxRetries: 0
    });
  }

  private static isNotFoundError(error: unknown): boolean {
    if (statusOf(error) === 404) return true;
    const message = error instanceof Error ? error.message : String(error);
    return /not found/i.test(message);
  }

  private static isJsonModeUnsupported(error: unknown): boolean {
    const message = error instanceof Error ? error.message : String(error);
    return statusOf(error) === 400 && /response_format|json_object/i.test(message);
  }

  private async validateModel(): Promise<void> {
    try {
      const response = await this.client.models.list();
      const modelIds = response.data.map((item) => item.id.trim()).filter(Boolean);
      if (modelIds.length === 0 || modelIds.includes(this.model)) return;

      const sample = modelIds.slice(0, 8).join(", ");
      throw new Error(`Configured OPENAI_MODEL "${this.model}" is not in provider model list. Available models (sample): ${sample}`);
    } catch (error: unknown) {
      // Some compatible providers do not expose /models at all.
      if (OpenAiClient.isNotFoundError(error) || statusOf(error) === 405 || statusOf(error) === 501) return;
      throw error;
    }
  }

  async assertModelAvailable(): Promise<void> {
    if (!this.modelValidationPromise) {
      this.modelValidationPromise = this.validateModel();
    }
    return this.modelValidationPromise;
  }

  private async completeWithChat(system: string, user: string, jsonMode: boolean, signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: 0.2,
        messages: [
          { role: "system", content: system },
          { role: "user", content: user }
        ],
        ...(jsonMode ? { response_format: { type: "json_object" as const } } : {})
      },
      { signal }
    );

    const text = response.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new EmptyOutputError();
    }
    return text;
  }

  async completeJsonObject(system: string, user: string, signal?: AbortSignal): Promise<string> {
    await this.assertModelAvailable();

    try {
      return await this.completeWithChat(system, user, true, signal);
    } catch (error: unknown) {
      if (!OpenAiClient.isJsonModeUnsupported(error)) {
        throw error;
      }
    }

    // the JSON object is extracted from free text downstream
    return this.completeWithChat(system, user, false, signal);
  }
}
