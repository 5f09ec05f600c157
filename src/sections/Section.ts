import { JsonEntries, JsonValue, shallowMerge } from '../kubernetes/utils/StructuralMerge.js';
import { encodeMembers } from './PayloadEncoder.js';

/**
 * An agent section: an ordered set of keys rendered as one JSON line.
 */
export class Section {
  private readonly content = new Map<string, JsonValue>();

  /**
   * Add the keys of `data`. Object values under an existing key are overlaid
   * one level deep; a repeated scalar key raises `DuplicateKeyError`.
   */
  public insert(data: JsonEntries): this {
    shallowMerge(this.content, data);
    return this;
  }

  public get size(): number {
    return this.content.size;
  }

  public entries(): [string, JsonValue][] {
    return [...this.content];
  }

  public output(): string {
    return encodeMembers(this.content);
  }
}
