import { HashMemo, isFresh, resolveGated } from "../logic/cacheGate";

describe("resolveGated", () => {
  test("hash igual reaproveita sem calcular", async () => {
    const compute = jest.fn(async () => "novo");
    const entry = { value: "antigo", boardHash: "abc" };

    const result = await resolveGated(entry, "abc", compute);
    expect(result).toEqual({ entry, reused: true });
    expect(compute).not.toHaveBeenCalled();
  });

  test("hash diferente calcula uma vez e marca com o hash atual", async () => {
    const compute = jest.fn(async () => "novo");

    const result = await resolveGated({ value: "antigo", boardHash: "abc" }, "def", compute);
    expect(result).toEqual({ entry: { value: "novo", boardHash: "def" }, reused: false });
    expect(compute).toHaveBeenCalledTimes(1);
  });

  test("sem entrada calcula", async () => {
    const result = await resolveGated(undefined, "abc", async () => 42);
    expect(result).toEqual({ entry: { value: 42, boardHash: "abc" }, reused: false });
  });

  test("erro do cálculo é propagado", async () => {
    await expect(
      resolveGated(undefined, "abc", async () => {
        throw new Error("falhou");
      })
    ).rejects.toThrow("falhou");
  });
});

describe("isFresh", () => {
  test("só é fresco com o mesmo hash", () => {
    expect(isFresh(undefined, "abc")).toBe(false);
    expect(isFresh({ value: 1, boardHash: "abc" }, "abc")).toBe(true);
    expect(isFresh({ value: 1, boardHash: "abc" }, "ABC")).toBe(false);
  });
});

describe("HashMemo", () => {
  test("rejeita tamanho inválido", () => {
    expect(() => new HashMemo(0)).toThrow(RangeError);
    expect(() => new HashMemo(1.5)).toThrow(RangeError);
  });

  test("getOrCompute calcula uma vez por hash", async () => {
    const memo = new HashMemo<string>();
    const compute = jest.fn(async () => "png");

    const first = await memo.getOrCompute("h1", compute);
    const second = await memo.getOrCompute("h1", compute);

    expect(first.reused).toBe(false);
    expect(second).toEqual({ entry: { value: "png", boardHash: "h1" }, reused: true });
    expect(compute).toHaveBeenCalledTimes(1);
    expect(memo.size).toBe(1);
  });

  test("descarta o mais antigo ao passar do limite", () => {
    const memo = new HashMemo<number>(2);
    memo.set("a", 1);
    memo.set("b", 2);
    memo.set("c", 3);

    expect(memo.size).toBe(2);
    expect(memo.get("a")).toBeUndefined();
    expect(memo.get("b")).toBe(2);
    expect(memo.get("c")).toBe(3);
  });

  test("regravar uma chave a torna a mais recente", () => {
    const memo = new HashMemo<number>(2);
    memo.set("a", 1);
    memo.set("b", 2);
    memo.set("a", 10);
    memo.set("c", 3);

    expect(memo.get("a")).toBe(10);
    expect(memo.get("b")).toBeUndefined();
  });

  test("clear esvazia", () => {
    const memo = new HashMemo<number>();
    memo.set("a", 1);
    memo.clear();
    expect(memo.size).toBe(0);
  });
});
