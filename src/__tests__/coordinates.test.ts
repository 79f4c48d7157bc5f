import { BOARD_SIZE, formatPosition, isInBounds, parseMove, parsePosition } from "../logic/coordinates";

describe("parsePosition", () => {
  test("converte coluna A..O e linha 01..15 para índices base 0", () => {
    expect(parsePosition("A-01")).toEqual({ ok: true, value: { row: 0, column: 0 } });
    expect(parsePosition("H-08")).toEqual({ ok: true, value: { row: 7, column: 7 } });
    expect(parsePosition("O-15")).toEqual({ ok: true, value: { row: 14, column: 14 } });
    expect(parsePosition("C-12")).toEqual({ ok: true, value: { row: 11, column: 2 } });
  });

  test.each([
    ["P-01", "P"],
    ["h-08", "h"],
    ["HH-08", "HH"],
    ["H-8", "8"],
    ["H-008", "008"],
    ["H-0a", "0a"],
    ["H-00", "00"],
    ["H-16", "16"],
    ["H08", "H08"],
    ["H-08-X", "H-08-X"],
    ["", ""],
  ])("rejeita %p apontando o trecho %p", (text, offending) => {
    const result = parsePosition(text);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.offending).toBe(offending);
  });

  test("mensagens indicam o que falhou", () => {
    expect(parsePosition("Z-01")).toEqual({ ok: false, offending: "Z", message: "invalid column: Z" });
    expect(parsePosition("A-99")).toEqual({ ok: false, offending: "99", message: "row out of range: 99" });
    expect(parsePosition("A01")).toEqual({
      ok: false,
      offending: "A01",
      message: "invalid position format: A01",
    });
  });
});

describe("formatPosition", () => {
  test("gera coluna em letra e linha com dois dígitos", () => {
    expect(formatPosition({ row: 0, column: 0 })).toBe("A-01");
    expect(formatPosition({ row: 7, column: 7 })).toBe("H-08");
    expect(formatPosition({ row: 14, column: 14 })).toBe("O-15");
  });

  test("parse(format(p)) devolve p para todas as casas", () => {
    for (let row = 0; row < BOARD_SIZE; row++) {
      for (let column = 0; column < BOARD_SIZE; column++) {
        expect(parsePosition(formatPosition({ row, column }))).toEqual({ ok: true, value: { row, column } });
      }
    }
  });
});

describe("parseMove", () => {
  test("separa posição, peça e coordenada", () => {
    expect(parseMove("H-08-X")).toEqual({
      ok: true,
      value: { position: { row: 7, column: 7 }, piece: "X", coordinate: "H-08" },
    });
    expect(parseMove("A-15-O")).toEqual({
      ok: true,
      value: { position: { row: 14, column: 0 }, piece: "O", coordinate: "A-15" },
    });
  });

  test("format da posição reproduz a coordenada original", () => {
    const result = parseMove("K-03-O");
    expect(result.ok).toBe(true);
    if (result.ok) expect(formatPosition(result.value.position)).toBe(result.value.coordinate);
  });

  test.each([
    ["H-08-Z", "Z"],
    ["H-08-x", "x"],
    ["H-08-XX", "XX"],
    ["H-08-", ""],
    ["H-08", "H-08"],
    ["H-08-X-1", "H-08-X-1"],
    ["Z-08-X", "Z"],
    ["H-16-O", "16"],
  ])("rejeita %p apontando o trecho %p", (text, offending) => {
    const result = parseMove(text);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.offending).toBe(offending);
  });

  test("peça é validada antes da coordenada", () => {
    expect(parseMove("Z-99-Q")).toEqual({
      ok: false,
      offending: "Q",
      message: "invalid piece: Q (must be X or O)",
    });
    expect(parseMove("Z-08-X")).toEqual({
      ok: false,
      offending: "Z",
      message: "invalid position: invalid column: Z",
    });
  });
});

describe("isInBounds", () => {
  test("aceita 0..14 e rejeita o resto", () => {
    expect(isInBounds({ row: 0, column: 14 })).toBe(true);
    expect(isInBounds({ row: -1, column: 0 })).toBe(false);
    expect(isInBounds({ row: 0, column: 15 })).toBe(false);
    expect(isInBounds({ row: 2.5, column: 3 })).toBe(false);
  });
});
