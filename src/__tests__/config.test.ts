import { loadConfig } from "../config";
import { UsageError } from "../errors";

describe("loadConfig", () => {
  test("defaults sem nenhuma variável", () => {
    const config = loadConfig({});
    expect(config).toEqual({
      isProd: false,
      store: { kind: "file", stateFile: "gamestate.json" },
      imageFile: "gomoku.png",
      analysis: {
        provider: "bedrock",
        bedrockModelId: "us.anthropic.claude-3-7-sonnet-20250219-v1:0",
        awsRegion: "us-west-2",
        bedrockToken: undefined,
        ollamaUrl: "http://localhost:11434",
        ollamaModel: undefined,
        timeoutMs: 60000,
      },
      http: {
        port: 3000,
        frontendOrigin: undefined,
        allowAllOrigins: false,
        rateWindowMs: 1000,
        rateMax: 20,
      },
    });
  });

  test("converte números e flags", () => {
    const config = loadConfig({
      NODE_ENV: "production",
      PORT: "8080",
      ALLOW_ALL_ORIGINS: "TRUE",
      RATE_MAX: "5",
      ANALYSIS_TIMEOUT_MS: "1500",
    });
    expect(config.isProd).toBe(true);
    expect(config.http.port).toBe(8080);
    expect(config.http.allowAllOrigins).toBe(true);
    expect(config.http.rateMax).toBe(5);
    expect(config.analysis.timeoutMs).toBe(1500);
  });

  test("string vazia conta como ausente para token e modelo", () => {
    const config = loadConfig({ AWS_BEARER_TOKEN_BEDROCK: "", OLLAMA_MODEL: "" });
    expect(config.analysis.bedrockToken).toBeUndefined();
    expect(config.analysis.ollamaModel).toBeUndefined();
  });

  test("store mongo com URI e sessão", () => {
    const config = loadConfig({ GOMOKU_STORE: "mongo", MONGODB_URI: "mongodb://localhost/gomoku", GOMOKU_SESSION_ID: "mesa-1" });
    expect(config.store).toEqual({ kind: "mongo", uri: "mongodb://localhost/gomoku", sessionId: "mesa-1" });
  });

  test("store mongo sem URI é erro de configuração", () => {
    expect(() => loadConfig({ GOMOKU_STORE: "mongo" })).toThrow(UsageError);
    expect(() => loadConfig({ GOMOKU_STORE: "mongo" })).toThrow(
      "invalid configuration:\n  MONGODB_URI: MONGODB_URI is required when GOMOKU_STORE=mongo"
    );
  });

  test("valores inválidos listam a variável", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(/^invalid configuration:\n {2}PORT: /);
    expect(() => loadConfig({ ANALYSIS_PROVIDER: "gpt" })).toThrow(/ANALYSIS_PROVIDER: /);
  });
});
