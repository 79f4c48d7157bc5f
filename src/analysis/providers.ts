import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { BedrockRuntimeClient, ConverseCommand, type ConverseCommandOutput } from "@aws-sdk/client-bedrock-runtime";
import type { AppConfig } from "../config";
import { CollaboratorUnavailableError, describeError } from "../errors";

/** Gera texto livre a partir de um prompt; falha vira CollaboratorUnavailableError */
export interface AnalysisProvider {
  readonly name: string;
  generate(prompt: string, systemPrompt?: string): Promise<string>;
}

const MAX_TOKENS = 1000;
const TEMPERATURE = 0.6;

/** Só a parte da resposta que lemos */
export type ConverseReply = Pick<ConverseCommandOutput, "output">;

/** Subconjunto do BedrockRuntimeClient que usamos (facilita fakes nos testes) */
export interface ConverseClient {
  send(command: ConverseCommand): Promise<ConverseReply>;
}

export class BedrockAnalysisProvider implements AnalysisProvider {
  readonly name = "bedrock";

  constructor(private readonly client: ConverseClient, private readonly modelId: string) {}

  static fromConfig(config: AppConfig["analysis"]): BedrockAnalysisProvider {
    return new BedrockAnalysisProvider(new BedrockRuntimeClient({ region: config.awsRegion }), config.bedrockModelId);
  }

  async generate(prompt: string, systemPrompt?: string): Promise<string> {
    const command = new ConverseCommand({
      modelId: this.modelId,
      messages: [{ role: "user", content: [{ text: prompt }] }],
      system: systemPrompt ? [{ text: systemPrompt }] : undefined,
      inferenceConfig: { maxTokens: MAX_TOKENS, temperature: TEMPERATURE },
    });

    let response: ConverseReply;
    try {
      response = await this.client.send(command);
    } catch (err) {
      throw new CollaboratorUnavailableError("analysis", `bedrock converse failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    const text = response.output?.message?.content?.[0]?.text;
    if (!text) {
      throw new CollaboratorUnavailableError("analysis", "no text content in bedrock response");
    }
    return text;
  }
}

const OllamaChatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
});

// Chat API do Ollama, sem streaming
export class OllamaAnalysisProvider implements AnalysisProvider {
  readonly name = "ollama";
  private readonly http: AxiosInstance;

  constructor(baseUrl: string, private readonly model: string, timeoutMs: number) {
    this.http = axios.create({
      baseURL: normalizeUrl(baseUrl),
      timeout: timeoutMs,
      headers: { "Content-Type": "application/json" },
    });
  }

  async generate(prompt: string, systemPrompt?: string): Promise<string> {
    const messages = [
      ...(systemPrompt ? [{ role: "system", content: systemPrompt }] : []),
      { role: "user", content: prompt },
    ];

    let data: unknown;
    try {
      const response = await this.http.post("/api/chat", {
        model: this.model,
        messages,
        stream: false,
        options: { temperature: TEMPERATURE, num_predict: MAX_TOKENS },
      });
      data = response.data;
    } catch (err) {
      throw new CollaboratorUnavailableError("analysis", `ollama chat failed: ${describeError(err)}`, { cause: err });
    }

    const parsed = OllamaChatResponseSchema.safeParse(data);
    if (!parsed.success || !parsed.data.message.content.trim()) {
      throw new CollaboratorUnavailableError("analysis", "no text content in ollama response");
    }
    return parsed.data.message.content;
  }
}

/** Garante protocolo e remove a barra final */
export function normalizeUrl(url: string): string {
  const clean = url.trim().replace(/\/$/, "");
  return /^https?:\/\//i.test(clean) ? clean : `http://${clean}`;
}

/**
 * Provider configurado, ou undefined quando a análise não está disponível
 * (sem token do Bedrock, sem modelo do Ollama, ou "none").
 */
export function createAnalysisProvider(config: AppConfig["analysis"]): AnalysisProvider | undefined {
  switch (config.provider) {
    case "bedrock":
      return config.bedrockToken ? BedrockAnalysisProvider.fromConfig(config) : undefined;
    case "ollama":
      return config.ollamaModel
        ? new OllamaAnalysisProvider(config.ollamaUrl, config.ollamaModel, config.timeoutMs)
        : undefined;
    case "none":
      return undefined;
  }
}

export function unavailableReason(config: AppConfig["analysis"]): string {
  switch (config.provider) {
    case "bedrock":
      return "AI analysis not available - missing AWS_BEARER_TOKEN_BEDROCK";
    case "ollama":
      return "AI analysis not available - OLLAMA_MODEL not configured";
    case "none":
      return "AI analysis disabled (ANALYSIS_PROVIDER=none)";
  }
}
