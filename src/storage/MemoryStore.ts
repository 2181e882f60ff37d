/**
 * MemoryStore - the single shared key-value table.
 *
 * Every operation runs its map access without awaiting in between, so on the
 * event loop each call is one indivisible step: readers never see a partial
 * write and concurrent writers to one key are ordered last-writer-wins.
 */

import { Logger, consoleLogger } from '../common/Logger';
import { JsonValue } from '../common/Types';
import {
  IKeyValueStore,
  KeyValueStoreDependencies,
  Lookup,
  MutationEvent,
} from '../interfaces/Storage';

export class MemoryStore implements IKeyValueStore {
  private readonly data = new Map<string, JsonValue>();
  private readonly onMutation: ((event: MutationEvent) => void) | undefined;
  private readonly logger: Logger;

  constructor(dependencies: KeyValueStoreDependencies = {}) {
    this.onMutation = dependencies.onMutation;
    this.logger = dependencies.logger ?? consoleLogger;
  }

  async get(key: string): Promise<Lookup> {
    return this.lookup(key);
  }

  async set(key: string, value: JsonValue): Promise<Lookup> {
    const previous = this.lookup(key);
    this.data.set(key, value);

    if (previous.found) {
      this.emit({ type: 'overwrite', key, previous: previous.value, value });
    } else {
      this.emit({ type: 'insert', key, value });
    }

    return previous;
  }

  async delete(key: string): Promise<Lookup> {
    const removed = this.lookup(key);

    if (removed.found) {
      this.data.delete(key);
      this.emit({ type: 'delete', key, value: removed.value });
    } else {
      this.emit({ type: 'delete-missing', key });
    }

    return removed;
  }

  size(): number {
    return this.data.size;
  }

  private lookup(key: string): Lookup {
    if (!this.data.has(key)) {
      return { found: false };
    }
    // has() just confirmed presence; the stored value itself may be null
    return { found: true, value: this.data.get(key) ?? null };
  }

  /**
   * The map has already changed when this runs, so a failing hook is logged
   * rather than surfaced as a failed write.
   */
  private emit(event: MutationEvent): void {
    if (!this.onMutation) {
      return;
    }
    try {
      this.onMutation(event);
    } catch (err) {
      this.logger.error(`Mutation hook failed for ${event.type} of key ${event.key}:`, err);
    }
  }
}
