import { z } from "zod";
import { UsageError } from "./errors";

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => String(v ?? "").toLowerCase() === "true");

export const AnalysisProviderSchema = z.enum(["bedrock", "ollama", "none"]);
export type AnalysisProviderKind = z.infer<typeof AnalysisProviderSchema>;

/**
 * Variáveis de ambiente aceitas. `dotenv/config` é carregado no entrypoint,
 * aqui só validamos e aplicamos os defaults.
 */
export const EnvSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

    // persistência
    GOMOKU_STORE: z.enum(["file", "mongo"]).default("file"),
    GOMOKU_STATE_FILE: z.string().min(1).default("gamestate.json"),
    GOMOKU_IMAGE_FILE: z.string().min(1).default("gomoku.png"),
    GOMOKU_SESSION_ID: z.string().regex(/^[A-Za-z0-9_-]{1,64}$/).default("default"),
    MONGODB_URI: z.string().optional(),

    // análise
    ANALYSIS_PROVIDER: AnalysisProviderSchema.default("bedrock"),
    BEDROCK_MODEL_ID: z.string().min(1).default("us.anthropic.claude-3-7-sonnet-20250219-v1:0"),
    AWS_REGION: z.string().min(1).default("us-west-2"),
    AWS_BEARER_TOKEN_BEDROCK: z.string().optional(),
    OLLAMA_URL: z.string().default("http://localhost:11434"),
    OLLAMA_MODEL: z.string().optional(),
    ANALYSIS_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

    // visualizador HTTP
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    FRONTEND_ORIGIN: z.string().optional(),
    ALLOW_ALL_ORIGINS: booleanFlag,
    RATE_WINDOW_MS: z.coerce.number().int().positive().default(1000),
    RATE_MAX: z.coerce.number().int().positive().default(20),
  })
  .superRefine((env, ctx) => {
    if (env.GOMOKU_STORE === "mongo" && !env.MONGODB_URI) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MONGODB_URI"],
        message: "MONGODB_URI is required when GOMOKU_STORE=mongo",
      });
    }
  });

export interface AppConfig {
  isProd: boolean;
  store:
    | { kind: "file"; stateFile: string }
    | { kind: "mongo"; uri: string; sessionId: string };
  imageFile: string;
  analysis: {
    provider: AnalysisProviderKind;
    bedrockModelId: string;
    awsRegion: string;
    bedrockToken?: string;
    ollamaUrl: string;
    ollamaModel?: string;
    timeoutMs: number;
  };
  http: {
    port: number;
    frontendOrigin?: string;
    allowAllOrigins: boolean;
    rateWindowMs: number;
    rateMax: number;
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`);
    throw new UsageError(`invalid configuration:\n  ${issues.join("\n  ")}`);
  }
  const env = parsed.data;

  return {
    isProd: env.NODE_ENV === "production",
    store:
      env.GOMOKU_STORE === "mongo" && env.MONGODB_URI
        ? { kind: "mongo", uri: env.MONGODB_URI, sessionId: env.GOMOKU_SESSION_ID }
        : { kind: "file", stateFile: env.GOMOKU_STATE_FILE },
    imageFile: env.GOMOKU_IMAGE_FILE,
    analysis: {
      provider: env.ANALYSIS_PROVIDER,
      bedrockModelId: env.BEDROCK_MODEL_ID,
      awsRegion: env.AWS_REGION,
      bedrockToken: env.AWS_BEARER_TOKEN_BEDROCK || undefined,
      ollamaUrl: env.OLLAMA_URL,
      ollamaModel: env.OLLAMA_MODEL || undefined,
      timeoutMs: env.ANALYSIS_TIMEOUT_MS,
    },
    http: {
      port: env.PORT,
      frontendOrigin: env.FRONTEND_ORIGIN,
      allowAllOrigins: env.ALLOW_ALL_ORIGINS,
      rateWindowMs: env.RATE_WINDOW_MS,
      rateMax: env.RATE_MAX,
    },
  };
}
