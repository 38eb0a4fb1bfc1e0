/**
 * Vocabulary lookup table.
 *
 * Maps whitespace-delimited token strings to small integer ids for one side
 * of a parallel corpus. The first four entries are reserved markers; any
 * string outside the table maps to the unknown id.
 */
import { ValidationError } from "@parabatch/core";

export const PAD = "<pad>";
export const UNK = "<unk>";
export const BOS = "<bos>";
export const EOS = "<eos>";

/** Reserved markers, in id order. */
export const MARKERS = [PAD, UNK, BOS, EOS] as const;

export const PAD_ID = 0;
export const UNK_ID = 1;
export const BOS_ID = 2;
export const EOS_ID = 3;

export class VocabularyTable {
  /** token id -> string */
  private readonly _itos: readonly string[];

  /** string -> token id */
  private readonly _stoi: ReadonlyMap<string, number>;

  private constructor(itos: readonly string[], stoi: ReadonlyMap<string, number>) {
    this._itos = itos;
    this._stoi = stoi;
  }

  /**
   * Build a table from an ordered list of distinct token strings.
   *
   * Throws `ValidationError` when the reserved markers are missing or out of
   * place, or when an entry repeats.
   */
  static build(tokenLines: readonly string[]): VocabularyTable {
    if (tokenLines.length < MARKERS.length) {
      throw new ValidationError({
        message: `Vocabulary needs at least ${MARKERS.length} entries (${MARKERS.join(" ")}), got ${tokenLines.length}`,
      });
    }
    for (let id = 0; id < MARKERS.length; id++) {
      if (tokenLines[id] !== MARKERS[id]) {
        throw new ValidationError({
          message: `${MARKERS[id]} must exist in vocab with id=${id} while found "${tokenLines[id]}"`,
        });
      }
    }

    const itos = [...tokenLines];
    const stoi = new Map<string, number>();
    for (let id = 0; id < itos.length; id++) {
      const prev = stoi.get(itos[id]);
      if (prev !== undefined) {
        throw new ValidationError({
          message: `Duplicate vocabulary entry "${itos[id]}" at ids ${prev} and ${id}`,
        });
      }
      stoi.set(itos[id], id);
    }
    return new VocabularyTable(itos, stoi);
  }

  get size(): number {
    return this._itos.length;
  }

  get padId(): number { return PAD_ID; }
  get unkId(): number { return UNK_ID; }
  get bosId(): number { return BOS_ID; }
  get eosId(): number { return EOS_ID; }

  /** Id of `token`, or the unknown id when absent. */
  idOf(token: string): number {
    return this._stoi.get(token) ?? UNK_ID;
  }

  tokenOf(id: number): string {
    if (!this.hasId(id)) {
      throw new ValidationError({ message: `Token id ${id} out of range [0, ${this.size})` });
    }
    return this._itos[id];
  }

  hasId(id: number): boolean {
    return Number.isInteger(id) && id >= 0 && id < this._itos.length;
  }

  hasToken(token: string): boolean {
    return this._stoi.has(token);
  }

  /** Map one whitespace-tokenized line to ids. Markers are not added. */
  encode(line: string): Int32Array {
    const tokens = line.trim().split(/\s+/).filter((w) => w.length > 0);
    const ids = new Int32Array(tokens.length);
    for (let i = 0; i < tokens.length; i++) ids[i] = this.idOf(tokens[i]);
    return ids;
  }

  decode(ids: ArrayLike<number>): string {
    const parts: string[] = [];
    for (let i = 0; i < ids.length; i++) parts.push(this.tokenOf(ids[i]));
    return parts.join(" ");
  }
}
