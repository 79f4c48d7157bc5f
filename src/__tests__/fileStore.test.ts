import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { PersistenceError } from "../errors";
import { createGame } from "../logic/game";
import { loadConfig } from "../config";
import { createStore, FileGameStore, MongoGameStore } from "../storage";
import { toSnapshot } from "../storage/snapshot";
import { play } from "./helpers/gameFixtures";

let dir: string;
let file: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "gomoku-store-"));
  file = path.join(dir, "gamestate.json");
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("FileGameStore", () => {
  test("sem arquivo, load devolve jogo novo", async () => {
    const store = new FileGameStore(file);
    await expect(store.load()).resolves.toEqual(createGame());
  });

  test("save grava JSON indentado e load restaura o mesmo estado", async () => {
    const store = new FileGameStore(file);
    const state = play(["H-08-O", "I-08-X"]);
    await store.save(state);

    const text = await fs.readFile(file, "utf8");
    expect(text.endsWith("}\n")).toBe(true);
    expect(text).toContain('\n  "current_turn": "WHITE",\n');
    expect(JSON.parse(text)).toEqual(toSnapshot(state));

    await expect(new FileGameStore(file).load()).resolves.toEqual(state);
  });

  test("JSON inválido vira PersistenceError", async () => {
    await fs.writeFile(file, "{ not json", "utf8");
    const store = new FileGameStore(file);
    await expect(store.load()).rejects.toThrow(PersistenceError);
    await expect(store.load()).rejects.toThrow(`failed to parse game state file ${file}`);
  });

  test("snapshot inconsistente é recusado no load", async () => {
    const snap = toSnapshot(play(["H-08-O"]));
    await fs.writeFile(file, JSON.stringify({ ...snap, current_turn: "WHITE" }), "utf8");
    await expect(new FileGameStore(file).load()).rejects.toThrow(
      "inconsistent game snapshot: current turn should be BLACK"
    );
  });

  test("erro de leitura que não é ENOENT é reportado", async () => {
    // diretório no lugar do arquivo
    const store = new FileGameStore(dir);
    await expect(store.load()).rejects.toThrow(`failed to read game state file ${dir}`);
  });

  test("erro de escrita vira PersistenceError", async () => {
    const missing = path.join(dir, "nao-existe", "gamestate.json");
    const store = new FileGameStore(missing);
    await expect(store.save(createGame())).rejects.toThrow(`failed to write game state file ${missing}`);
  });

  test("ENOENT é reconhecido mesmo quando o erro não é instanceof Error", async () => {
    // fs dentro do jest entrega erros de outro realm; aqui simulamos com um objeto puro
    const enoent = { code: "ENOENT", message: "no such file or directory" };
    const readSpy = jest.spyOn(fs, "readFile").mockRejectedValueOnce(enoent);
    const unlinkSpy = jest.spyOn(fs, "unlink").mockRejectedValueOnce(enoent);
    const store = new FileGameStore(file);

    await expect(store.load()).resolves.toEqual(createGame());
    await expect(store.reset()).resolves.toBe(false);

    readSpy.mockRestore();
    unlinkSpy.mockRestore();
  });

  test("outros códigos de erro continuam sendo falha, com a mensagem original", async () => {
    const readSpy = jest
      .spyOn(fs, "readFile")
      .mockRejectedValueOnce({ code: "EACCES", message: "permission denied" });
    const store = new FileGameStore(file);

    await expect(store.load()).rejects.toThrow(`failed to read game state file ${file}: permission denied`);
    readSpy.mockRestore();
  });

  test("reset apaga o arquivo e informa se existia", async () => {
    const store = new FileGameStore(file);
    await store.save(play(["H-08-O"]));

    await expect(store.reset()).resolves.toBe(true);
    await expect(fs.access(file)).rejects.toThrow();
    await expect(store.reset()).resolves.toBe(false);
    await expect(store.load()).resolves.toEqual(createGame());
  });
});

describe("createStore", () => {
  test("arquivo por padrão", () => {
    const store = createStore(loadConfig({ GOMOKU_STATE_FILE: file }));
    expect(store).toBeInstanceOf(FileGameStore);
    if (store instanceof FileGameStore) expect(store.path).toBe(file);
  });

  test("mongo quando configurado (sem conectar)", () => {
    const store = createStore(
      loadConfig({ GOMOKU_STORE: "mongo", MONGODB_URI: "mongodb://localhost:27017/gomoku", GOMOKU_SESSION_ID: "s1" })
    );
    expect(store).toBeInstanceOf(MongoGameStore);
    if (store instanceof MongoGameStore) expect(store.sessionId).toBe("s1");
  });
});
