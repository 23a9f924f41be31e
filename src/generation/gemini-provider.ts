import { type GenerateContentResponse, GoogleGenAI } from "@google/genai";

/** Anything that can turn a composed prompt into raw model text. */
export interface TextModel {
  readonly model: string;
  generateText(prompt: string): Promise<string>;
}

/**
 * Concatenate the text parts of the first candidate that has any.
 * Non-text parts (inline data, function calls) are ignored.
 */
export function collectCandidateText(response: GenerateContentResponse): string {
  for (const candidate of response.candidates ?? []) {
    let text = "";
    for (const part of candidate.content?.parts ?? []) {
      if (typeof part.text === "string") text += part.text;
    }
    if (text) return text;
  }
  return "";
}

export class GeminiTextModel implements TextModel {
  private readonly client: GoogleGenAI;

  constructor(
    apiKey: string,
    readonly model: string,
  ) {
    this.client = new GoogleGenAI({ apiKey });
  }

  async generateText(prompt: string): Promise<string> {
    const response = await this.client.models.generateContent({
      model: this.model,
      contents: [{ role: "user", parts: [{ text: prompt }] }],
    });
    return collectCandidateText(response);
  }
}
