import { BedrockRuntimeClient, ConverseCommand } from "@aws-sdk/client-bedrock-runtime";
import type { VlmService } from "../../types/pipeline.js";

const MAX_TOKENS = 512;
const TEMPERATURE = 0.1;
const TOP_P = 0.9;

/** One-turn Converse call: the prompt plus a single JPEG. */
export class BedrockVlmService implements VlmService {
  constructor(private readonly client: BedrockRuntimeClient) {}

  async generate(modelId: string, prompt: string, image: Buffer): Promise<string> {
    const response = await this.client.send(
      new ConverseCommand({
        modelId,
        messages: [
          {
            role: "user",
            content: [{ text: prompt }, { image: { format: "jpeg", source: { bytes: image } } }]
          }
        ],
        inferenceConfig: { maxTokens: MAX_TOKENS, temperature: TEMPERATURE, topP: TOP_P }
      })
    );
    const content = response.output?.message?.content ?? [];
    return content.find((part) => typeof part.text === "string")?.text ?? "";
  }
}
