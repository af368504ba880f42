import Anthropic from "@anthropic-ai/sdk";
import type { VlmService } from "../../types/pipeline.js";

export class AnthropicVlmService implements VlmService {
  constructor(private readonly client: Anthropic) {}

  async generate(modelId: string, prompt: string, image: Buffer): Promise<string> {
    const response = await this.client.messages.create({
      model: modelId,
      max_tokens: 512,
      temperature: 0.1,
      messages: [
        {
          role: "user",
          content: [
            { type: "image", source: { type: "base64", media_type: "image/jpeg", data: image.toString("base64") } },
            { type: "text", text: prompt }
          ]
        }
      ]
    });
    const content = response.content.find((block) => block.type === "text");
    return content?.type === "text" ? content.text : "";
  }
}
