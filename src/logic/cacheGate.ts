/**
 * Gate de cache por hash de conteúdo.
 *
 * Um artefato derivado (análise, imagem...) guarda o hash do tabuleiro com o
 * qual foi calculado. Hash igual ao atual → reaproveita sem recalcular;
 * diferente → recalcula e grava com o hash novo.
 */

export interface HashTagged<T> {
  value: T;
  boardHash: string;
}

export function isFresh<T>(entry: HashTagged<T> | undefined, hash: string): entry is HashTagged<T> {
  return entry !== undefined && entry.boardHash === hash;
}

export interface GateResult<T> {
  entry: HashTagged<T>;
  reused: boolean;
}

/** `compute` só é chamado (uma vez) quando a entrada está ausente ou velha */
export async function resolveGated<T>(
  entry: HashTagged<T> | undefined,
  hash: string,
  compute: () => Promise<T>
): Promise<GateResult<T>> {
  if (isFresh(entry, hash)) {
    return { entry, reused: true };
  }
  const value = await compute();
  return { entry: { value, boardHash: hash }, reused: false };
}

/**
 * Memo chave/valor indexado por hash, para artefatos externos ao snapshot.
 * Limitado: ao passar de `maxEntries` descarta o mais antigo.
 */
export class HashMemo<T> {
  private readonly entries = new Map<string, T>();

  constructor(private readonly maxEntries = 16) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(hash: string): T | undefined {
    return this.entries.get(hash);
  }

  set(hash: string, value: T): void {
    this.entries.delete(hash);
    this.entries.set(hash, value);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  async getOrCompute(hash: string, compute: () => Promise<T>): Promise<GateResult<T>> {
    const hit = this.entries.get(hash);
    const result = await resolveGated(
      hit === undefined ? undefined : { value: hit, boardHash: hash },
      hash,
      compute
    );
    if (!result.reused) this.set(hash, result.entry.value);
    return result;
  }

  clear(): void {
    this.entries.clear();
  }
}
