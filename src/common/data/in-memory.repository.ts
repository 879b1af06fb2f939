import { randomUUID } from "node:crypto";
import type { Repository, WithId } from "./repository.interface";

/**
 * Map-backed repository. Records keep their insertion order, updates keep
 * their position, and records are deep-copied on the way in and out, so
 * nested arrays are never shared with callers.
 */
export class InMemoryRepository<TInput extends object> implements Repository<TInput> {
  private readonly records = new Map<string, WithId<TInput>>();

  constructor(seed: ReadonlyArray<WithId<TInput>> = []) {
    for (const record of seed) {
      this.records.set(record.id, structuredClone(record));
    }
  }

  async add(entity: TInput & { id?: string }): Promise<WithId<TInput>> {
    const id = entity.id && entity.id.length > 0 ? entity.id : randomUUID();
    const record: WithId<TInput> = structuredClone({ ...entity, id });
    this.records.set(id, record);
    return structuredClone(record);
  }

  async update(id: string, entity: TInput): Promise<WithId<TInput> | null> {
    if (!this.records.has(id)) {
      return null;
    }

    const record: WithId<TInput> = structuredClone({ ...entity, id });
    this.records.set(id, record);
    return structuredClone(record);
  }

  async list(): Promise<WithId<TInput>[]> {
    return Array.from(this.records.values(), (record) => structuredClone(record));
  }

  async get(id: string): Promise<WithId<TInput> | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }
}
