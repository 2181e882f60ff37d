import { Logger } from '../common/Logger';
import { JsonValue } from '../common/Types';

/**
 * Result of reading or removing a key. `null` is a legal stored value,
 * so absence is its own variant rather than a sentinel.
 */
export type Lookup =
  | { readonly found: true; readonly value: JsonValue }
  | { readonly found: false };

export type MutationEvent =
  | { readonly type: 'insert'; readonly key: string; readonly value: JsonValue }
  | { readonly type: 'overwrite'; readonly key: string; readonly previous: JsonValue; readonly value: JsonValue }
  | { readonly type: 'delete'; readonly key: string; readonly value: JsonValue }
  | { readonly type: 'delete-missing'; readonly key: string };

export interface IKeyValueStore {
  get(key: string): Promise<Lookup>;

  /**
   * Insert or overwrite `key`.
   *
   * @returns the value that was replaced, if any
   */
  set(key: string, value: JsonValue): Promise<Lookup>;

  /**
   * Remove `key`. Removing an absent key is a no-op reported as `{ found: false }`.
   */
  delete(key: string): Promise<Lookup>;

  size(): number;
}

export interface KeyValueStoreDependencies {
  onMutation?: (event: MutationEvent) => void;
  /** Receives errors thrown by `onMutation`. */
  logger?: Logger;
}
